import type {
  DecisionEvent,
  TraceCollector,
  TraceEvent,
  WarningEvent,
} from "./types";

type WithoutTimestamp<E> = E extends TraceEvent ? Omit<E, "timestamp"> : never;
type EventBody = WithoutTimestamp<TraceEvent>;

/**
 * In-memory trace. Records nothing when constructed disabled.
 */
export class DefaultTraceCollector implements TraceCollector {
  private readonly events: TraceEvent[] = [];
  private readonly origin = performance.now();

  constructor(readonly enabled: boolean = false) {}

  private record(body: EventBody): void {
    if (!this.enabled) return;
    this.events.push({ ...body, timestamp: performance.now() - this.origin });
  }

  start(stageId: string): void {
    this.record({ stageId, eventType: "start" });
  }

  end(stageId: string, durationMs: number): void {
    this.record({ stageId, eventType: "end", data: { durationMs } });
  }

  decision(
    stageId: string,
    question: string,
    options: readonly string[],
    chosen: string,
    reason: string,
  ): void {
    this.record({
      stageId,
      eventType: "decision",
      data: { question, options, chosen, reason },
    });
  }

  warning(stageId: string, message: string): void {
    this.record({ stageId, eventType: "warning", data: { message } });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  clear(): void {
    this.events.length = 0;
  }
}

const NO_EVENTS: readonly TraceEvent[] = Object.freeze([]);

/**
 * Collector for untraced runs: every call is dropped.
 */
export const noOpTraceCollector: TraceCollector = Object.freeze({
  enabled: false,
  start: () => {},
  end: () => {},
  decision: () => {},
  warning: () => {},
  getEvents: () => NO_EVENTS,
  clear: () => {},
});

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : noOpTraceCollector;
}

export function isDecisionEvent(event: TraceEvent): event is DecisionEvent {
  return event.eventType === "decision";
}

export function isWarningEvent(event: TraceEvent): event is WarningEvent {
  return event.eventType === "warning";
}
