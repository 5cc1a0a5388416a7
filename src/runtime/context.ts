/**
 * RuntimeContext: the process-wide state every component receives at construction.
 * Single owner for the turn counter, background tasks, the outbound bus and the
 * installed agent; tests build one per case.
 */

import { OutboundDispatchBus } from "../bus/dispatcher";
import { TaskRegistry } from "./tasks";
import type { TurnOrchestrator } from "../pipeline/orchestrator";

/** Monotonic count of recorded turns for the process lifetime. */
export class TurnCounter {
  private count = 0;

  increment(): number {
    this.count += 1;
    return this.count;
  }

  get value(): number {
    return this.count;
  }
}

export class RuntimeContext {
  readonly turns = new TurnCounter();
  readonly tasks = new TaskRegistry();
  readonly bus: OutboundDispatchBus;
  private agentRef: TurnOrchestrator | undefined;

  constructor(bus: OutboundDispatchBus = new OutboundDispatchBus()) {
    this.bus = bus;
  }

  /** The orchestrator turns run on; undefined until startup finishes. */
  get agent(): TurnOrchestrator | undefined {
    return this.agentRef;
  }

  installAgent(agent: TurnOrchestrator | undefined): void {
    this.agentRef = agent;
  }

  /** Start the outbound consumer as a tracked task. */
  startBus(): void {
    void this.tasks.track("outbound.dispatch", this.bus.start());
  }

  /** Stop the bus (discarding queued messages) and wait for background work. */
  async shutdown(timeoutMs: number): Promise<string[]> {
    this.bus.stop();
    return this.tasks.drain(timeoutMs);
  }
}
