import { ProviderError } from '../core/errors.js';
import type { Instance, InstanceState } from '../core/types.js';
import type { CloudProvider } from '../provider/cloudProvider.js';
import { getLogger } from '../utils/logging.js';

export interface StartResult {
  instanceId: string;
  previousState: InstanceState;
  waited: boolean;
}

/** Inventory and power actions; analysts start a stopped host before acquiring memory. */
export class InstanceManager {
  constructor(
    private readonly provider: CloudProvider,
    private readonly waitSeconds: number,
  ) {}

  list(states?: InstanceState[]): Promise<Instance[]> {
    return this.provider.listInstances(states);
  }

  async start(instanceId: string, opts: { wait?: boolean } = {}): Promise<StartResult> {
    const instance = await this.require(instanceId);
    await this.provider.startInstance(instanceId);
    getLogger().info({ instanceId, previousState: instance.state }, 'instance start requested');
    if (opts.wait) {
      await this.provider.waitForInstanceRunning(instanceId, this.waitSeconds);
    }
    return { instanceId, previousState: instance.state, waited: Boolean(opts.wait) };
  }

  async stop(instanceId: string): Promise<{ instanceId: string; previousState: InstanceState }> {
    const instance = await this.require(instanceId);
    await this.provider.stopInstance(instanceId);
    getLogger().info({ instanceId, previousState: instance.state }, 'instance stop requested');
    return { instanceId, previousState: instance.state };
  }

  private async require(instanceId: string): Promise<Instance> {
    const instance = await this.provider.getInstance(instanceId);
    if (!instance) throw new ProviderError('INSTANCE_NOT_FOUND', `Instance ${instanceId} not found`);
    return instance;
  }
}
