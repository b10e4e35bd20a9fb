export type EventSeverity = 'info' | 'warning' | 'error';

export interface SimulationEvent {
  id: string;
  day: number;
  severity: EventSeverity;
  message: string;
  agentId?: string;
}
