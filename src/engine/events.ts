import type { EventSeverity, SimulationEvent } from '../domain/events';

export interface EventLog {
  events: SimulationEvent[];
  emit: (day: number, severity: EventSeverity, message: string, agentId?: string) => SimulationEvent;
}

/**
 * Run-scoped event log. Ids come from a per-run sequence rather than the wall clock, so two
 * runs over the same inputs produce identical logs.
 */
export const createEventLog = (): EventLog => {
  const events: SimulationEvent[] = [];
  let sequence = 0;
  const emit = (day: number, severity: EventSeverity, message: string, agentId?: string): SimulationEvent => {
    const event: SimulationEvent = {
      id: `evt-${day}-${sequence++}`,
      day,
      severity,
      message,
      ...(agentId === undefined ? {} : { agentId }),
    };
    events.push(event);
    return event;
  };
  return { events, emit };
};
