import { describe, it, expect } from 'vitest';
import { RouteTree, RouteTreeError } from '../host/route-tree.js';
import { makeHost } from './helpers.js';

describe('RouteTree', () => {
    it('should pre-register the host namespaces and route groups', () => {
        const tree = RouteTree.forHost(makeHost());

        expect(tree.namespaceNames()).toEqual(['admin']);
        expect(tree.routes()).toEqual([
            { namespace: 'admin', pathPrefix: '/v1', tag: 'admin', entryPoint: '<host>:admin/v1', owner: '<host>' },
        ]);
    });

    it('should resolve a path with the namespace guards unchanged', () => {
        const tree = RouteTree.forHost(makeHost());

        const match = tree.resolve('/admin/v1/users?page=2');

        expect(match?.namespace).toBe('admin');
        expect(match?.group.owner).toBe('<host>');
        expect(match?.guards).toEqual(['authenticated', 'admin-only']);
        expect(match?.subPath).toBe('/users');
    });

    it('should pick the longest matching prefix', () => {
        const tree = RouteTree.forHost(makeHost());
        tree.mountRouteGroup('admin', '/v1/reports', 'reports', '/plugins/admin-reports/api/v1', 'admin-reports');

        const match = tree.resolve('/admin/v1/reports/daily');

        expect(match?.group.owner).toBe('admin-reports');
        expect(match?.subPath).toBe('/daily');
        expect(tree.resolve('/admin/v1/reports')?.subPath).toBe('/');
    });

    it('should not match a prefix that is only a string prefix', () => {
        const tree = RouteTree.forHost(makeHost());
        expect(tree.resolve('/admin/v10')).toBeNull();
        expect(tree.resolve('/unknown/v1')).toBeNull();
        expect(tree.resolve('/')).toBeNull();
    });

    it('should refuse a second mount on the same prefix', () => {
        const tree = RouteTree.forHost(makeHost());
        expect(() => tree.mountRouteGroup('admin', 'v1/', 'x', 'entry', 'intruder'))
            .toThrow('Route group /admin/v1 is already mounted by <host>');
    });

    it('should refuse mounts into a missing namespace', () => {
        const tree = new RouteTree();
        expect(() => tree.mountRouteGroup('billing', '/v1', 'v1', 'entry', 'billing')).toThrow(RouteTreeError);
    });

    it('should only remove empty namespaces', () => {
        const tree = new RouteTree();
        tree.createNamespace('billing', 'billing', ['authenticated']);
        const handle = tree.mountRouteGroup('billing', '/v1', 'v1', 'entry', 'billing');

        expect(() => tree.removeNamespace('billing')).toThrow('Namespace "billing" still has 1 route group(s)');

        tree.unmountRouteGroup(handle);
        tree.removeNamespace('billing');
        expect(tree.hasNamespace('billing')).toBe(false);
    });

    it('should reject invalid or existing namespace names', () => {
        const tree = RouteTree.forHost(makeHost());
        expect(() => tree.createNamespace('admin', 'x', [])).toThrow('Namespace "admin" already exists');
        expect(() => tree.createNamespace('bad name', 'x', [])).toThrow('Invalid namespace name "bad name"');
    });
});
