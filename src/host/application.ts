import type { SettingValue } from '../plugins/types.js';
import type { ConfigurationStore } from '../compose/settings.js';
import type { MountReport } from '../compose/report.js';
import type { RouteMatch, RouteTree } from './route-tree.js';
import type { HostDefinition } from './types.js';

/**
 * Everything one composition pass produced
 */
export interface CompositionState {
    routes: RouteTree;
    settings: ConfigurationStore;
    report: MountReport;
    composedAt: Date;
}

/**
 * Host Application — serves from a single composition state
 *
 * The live state sits behind one reference. A reload composes a complete
 * replacement and `swap()`s it in, so no reader ever sees a half-mounted tree.
 */
export class HostApplication {
    private state: CompositionState | null = null;

    constructor(readonly definition: HostDefinition) { }

    /**
     * Replace the live state; returns the previous one
     */
    swap(next: CompositionState): CompositionState | null {
        if (!next.settings.isFrozen) {
            throw new Error('Refusing to serve a composition whose settings are not frozen');
        }
        const previous = this.state;
        this.state = next;
        return previous;
    }

    get composed(): boolean {
        return this.state !== null;
    }

    get current(): CompositionState {
        if (!this.state) {
            throw new Error('Host has not been composed yet');
        }
        return this.state;
    }

    resolve(requestPath: string): RouteMatch | null {
        return this.state?.routes.resolve(requestPath) ?? null;
    }

    setting(key: string): SettingValue | undefined {
        return this.state?.settings.get(key);
    }
}
