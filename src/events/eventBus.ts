import type { WrittenReport } from '../core/types.js';

type Listener<T> = (event: T) => void | Promise<void>;

export class EventBus<EventMap extends { [event: string]: unknown }> {
  private listeners: { [K in keyof EventMap]?: Listener<EventMap[K]>[] } = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): void {
    (this.listeners[event] ||= []).push(listener);
  }

  // Listeners run sequentially and are awaited, so the emitter knows side effects are done.
  async emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): Promise<void> {
    const list = this.listeners[event];
    if (!list) return;
    for (const l of list) {
      await l(payload);
    }
  }
}

export type WorkflowName = 'isolate' | 'snapshot' | 'delete-snapshot' | 'restore';

export interface EvidenceEvents {
  [event: string]: unknown;
  reportWritten: WrittenReport;
  snapshotCreated: { instanceId: string; volumeId: string; snapshotId: string };
  snapshotFailed: { instanceId: string; volumeId: string; error: string };
  workflowFinished: {
    workflow: WorkflowName;
    outcome: 'completed' | 'cancelled' | 'failed';
    seconds: number;
  };
}
