import { describe, it, expect } from 'vitest';
import { InstanceManager } from '../../src/services/instanceManager.js';
import { FakeCloudProvider, makeInstance } from '../utils/fakeProvider.js';

function setup() {
  const provider = new FakeCloudProvider([
    makeInstance({ id: 'i-1' }),
    makeInstance({ id: 'i-2', state: 'stopped' }),
  ]);
  return { provider, manager: new InstanceManager(provider, 60) };
}

describe('InstanceManager', () => {
  it('lists instances, optionally filtered by state', async () => {
    const { manager } = setup();
    expect((await manager.list()).map((i) => i.id)).toEqual(['i-1', 'i-2']);
    expect((await manager.list(['stopped'])).map((i) => i.id)).toEqual(['i-2']);
  });

  it('starts an instance and waits until it is running', async () => {
    const { provider, manager } = setup();
    const result = await manager.start('i-2', { wait: true });
    expect(result).toEqual({ instanceId: 'i-2', previousState: 'stopped', waited: true });
    expect(provider.calls).toEqual(['getInstance i-2', 'startInstance i-2', 'waitForInstanceRunning i-2']);
    expect(provider.instances.get('i-2')?.state).toBe('running');
  });

  it('returns after the start request without waiting', async () => {
    const { provider, manager } = setup();
    const result = await manager.start('i-2');
    expect(result.waited).toBe(false);
    expect(provider.calls).not.toContain('waitForInstanceRunning i-2');
  });

  it('stops an instance', async () => {
    const { provider, manager } = setup();
    expect(await manager.stop('i-1')).toEqual({ instanceId: 'i-1', previousState: 'running' });
    expect(provider.instances.get('i-1')?.state).toBe('stopping');
  });

  it('fails with INSTANCE_NOT_FOUND before any power call', async () => {
    const { provider, manager } = setup();
    await expect(manager.stop('i-missing')).rejects.toMatchObject({ code: 'INSTANCE_NOT_FOUND' });
    expect(provider.calls).toEqual(['getInstance i-missing']);
  });
});
