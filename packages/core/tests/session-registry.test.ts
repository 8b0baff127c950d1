import { describe, expect, it } from 'vitest';

import { SessionRegistry, type SessionHandle } from '../src/session/session-registry';

interface FakeAgent {
  name: string;
}

function handle(userId: string, name: string): SessionHandle<string[], FakeAgent> {
  return { userId, contextRef: [], agentRef: { name } };
}

describe('SessionRegistry', () => {
  it('returns the registered handle verbatim', () => {
    const registry = new SessionRegistry<string[], FakeAgent>();
    const h = handle('user-1', 'agent-a');

    registry.register('user-1', h);

    expect(registry.get('user-1')).toBe(h);
    expect(registry.getContext('user-1')).toBe(h.contextRef);
    expect(registry.getAgent('user-1')).toBe(h.agentRef);
    expect(registry.isActive('user-1')).toBe(true);
  });

  it('marks a user inactive after unregister', () => {
    const registry = new SessionRegistry<string[], FakeAgent>();
    registry.register('user-1', handle('user-1', 'agent-a'));

    expect(registry.unregister('user-1')).toBe(true);
    expect(registry.isActive('user-1')).toBe(false);
    expect(registry.get('user-1')).toBeUndefined();
    expect(registry.unregister('user-1')).toBe(false);
  });

  it('lets the last registration win', () => {
    const registry = new SessionRegistry<string[], FakeAgent>();
    const first = handle('user-1', 'agent-a');
    const second = handle('user-1', 'agent-b');

    registry.register('user-1', first);
    registry.register('user-1', second);

    expect(registry.get('user-1')).toBe(second);
    expect(registry.size).toBe(1);
  });

  it('lists active identities as a snapshot', () => {
    const registry = new SessionRegistry<string[], FakeAgent>();
    registry.register('user-1', handle('user-1', 'a'));
    registry.register('user-2', handle('user-2', 'b'));

    const active = registry.listActive();
    registry.unregister('user-1');

    expect([...active].sort()).toEqual(['user-1', 'user-2']);
    expect([...registry.listActive()]).toEqual(['user-2']);
  });

  it('is empty after clearing twice', () => {
    const registry = new SessionRegistry<string[], FakeAgent>();
    registry.register('user-1', handle('user-1', 'a'));

    registry.clear();
    registry.clear();

    expect(registry.size).toBe(0);
    expect(registry.listActive().size).toBe(0);
    expect(registry.getAgent('user-1')).toBeUndefined();
  });
});
