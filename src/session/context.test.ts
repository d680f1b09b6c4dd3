import { describe, it, expect } from 'vitest';
import { SessionContext } from './context.js';
import { SessionValueMissingError } from '../errors.js';

describe('SessionScope.sync', () => {
  it('stores and returns a provided value', () => {
    const scope = new SessionContext().scope('vcenter');
    expect(scope.sync('server', 'vc01.test.local')).toBe('vc01.test.local');
    expect(scope.get('server')).toBe('vc01.test.local');
  });

  it('returns the cached value when nothing is provided', () => {
    const scope = new SessionContext().scope('vcenter');
    scope.sync('server', 'vc01.test.local');
    expect(scope.sync('server', undefined)).toBe('vc01.test.local');
    expect(scope.sync('server', '')).toBe('vc01.test.local');
    expect(scope.sync('server', null)).toBe('vc01.test.local');
  });

  it('overwrites on new input (last write wins)', () => {
    const scope = new SessionContext().scope('nsx');
    scope.sync('server', 'nsx01');
    scope.sync('server', 'nsx02');
    expect(scope.sync('server', undefined)).toBe('nsx02');
  });

  it('throws when mandatory and nothing is cached', () => {
    const scope = new SessionContext().scope('vcloud');
    expect(() => scope.sync('token', undefined, true)).toThrow(SessionValueMissingError);
    expect(() => scope.sync('token', '', true)).toThrow("No value given for 'vcloud:token'");
  });

  it('returns undefined when optional and nothing is cached', () => {
    const scope = new SessionContext().scope('vcloud');
    expect(scope.sync('org', undefined)).toBeUndefined();
    expect(scope.has('org')).toBe(false);
  });

  it('re-reads return the same value until overwritten', () => {
    const scope = new SessionContext().scope('vcloud');
    const handle = { token: 'test-token' };
    scope.set('session', handle);
    expect(scope.get('session')).toBe(handle);
    expect(scope.get('session')).toBe(handle);
  });
});

describe('SessionContext', () => {
  it('keeps namespaces apart', () => {
    const ctx = new SessionContext();
    ctx.scope('vcenter').set('server', 'vc01');
    ctx.scope('nsx').set('server', 'nsx01');
    expect(ctx.scope('vcenter').get('server')).toBe('vc01');
    expect(ctx.scope('nsx').get('server')).toBe('nsx01');
  });

  it('shares entries between scope handles of the same namespace', () => {
    const ctx = new SessionContext();
    ctx.scope('vcenter').set('token', 'abc');
    expect(ctx.scope('vcenter').get('token')).toBe('abc');
  });

  it('does not share state between contexts', () => {
    const a = new SessionContext();
    const b = new SessionContext();
    a.scope('vcenter').set('server', 'vc01');
    expect(b.scope('vcenter').has('server')).toBe(false);
  });

  it('snapshot lists entries by namespaced key', () => {
    const ctx = new SessionContext();
    ctx.scope('vcenter').set('server', 'vc01');
    ctx.scope('vcloud').set('org', 'tenant-a');
    expect(ctx.snapshot()).toEqual({ 'vcenter:server': 'vc01', 'vcloud:org': 'tenant-a' });
  });

  it('delete removes a single entry', () => {
    const ctx = new SessionContext();
    const scope = ctx.scope('vcenter');
    scope.set('token', 'abc');
    expect(scope.delete('token')).toBe(true);
    expect(scope.has('token')).toBe(false);
  });
});
