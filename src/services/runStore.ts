import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { RunEvent, RunInput, RunRole, RunState, RunStatus } from "../types";

interface EventOptions {
  iteration?: number;
  data?: Record<string, unknown>;
}

const terminalStatuses: ReadonlySet<RunStatus> = new Set(["success", "no_signal", "exhausted", "failed"]);

export class RunStore {
  private readonly runs = new Map<string, RunState>();
  private readonly events = new Map<string, RunEvent[]>();
  private readonly emitter = new EventEmitter();

  create(input: RunInput): RunState {
    const run: RunState = {
      id: randomUUID(),
      status: "pending",
      input,
      iteration: 0,
      startedAt: new Date().toISOString()
    };
    this.runs.set(run.id, run);
    this.events.set(run.id, []);
    return run;
  }

  get(runId: string): RunState | undefined {
    return this.runs.get(runId);
  }

  updateStatus(runId: string, status: RunStatus, finalSummary?: string): void {
    const current = this.runs.get(runId);
    if (!current) return;

    current.status = status;
    if (terminalStatuses.has(status)) {
      current.endedAt = new Date().toISOString();
      current.finalSummary = finalSummary;
    }
  }

  setIteration(runId: string, iteration: number): void {
    const current = this.runs.get(runId);
    if (!current) return;
    current.iteration = iteration;
  }

  pushEvent(runId: string, role: RunRole, type: string, message: string, options: EventOptions = {}): RunEvent {
    const event: RunEvent = {
      id: randomUUID(),
      runId,
      timestamp: new Date().toISOString(),
      role,
      type,
      message,
      iteration: options.iteration,
      data: options.data
    };
    const list = this.events.get(runId) ?? [];
    list.push(event);
    this.events.set(runId, list);
    this.emitter.emit("run:*", event);
    return event;
  }

  getEvents(runId: string): RunEvent[] {
    return [...(this.events.get(runId) ?? [])];
  }

  /** Receives events of every run, including runs created after subscribing. */
  subscribeAll(handler: (event: RunEvent) => void): () => void {
    this.emitter.on("run:*", handler);
    return () => this.emitter.off("run:*", handler);
  }
}
