export type SignalEntity = {
  id: string;
  discoveredAt: Date;
  type: string;
  subject: string;
  payload: Record<string, unknown>;
  processed: boolean;
  resultedInInsight: boolean;
  insightId?: string;
};

/**
 * Portion of a signal that stages see. The id is left out so identical events share cached stage output.
 */
export type SignalSnapshot = {
  type: string;
  subject: string;
  subjectName?: string;
  discoveredAt: string;
  payload: Record<string, unknown>;
};

export type SignalOutcome = {
  resultedInInsight: boolean;
  insightId?: string;
};

export const toSignalSnapshot = (
  signal: SignalEntity,
  subjectName?: string,
): SignalSnapshot => ({
  type: signal.type,
  subject: signal.subject,
  subjectName,
  discoveredAt: signal.discoveredAt.toISOString(),
  payload: signal.payload,
});
