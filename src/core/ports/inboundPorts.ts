import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { StageInput, StageName } from "../pipeline/stages";

export type StageCallContext = {
  stage: StageName;
  attempt: number;
  signal: AbortSignal;
};

/**
 * Opaque analysis step. Output is returned raw and decoded by the stage executor.
 */
export type StageHandler<S extends StageName> = (
  input: StageInput<S>,
  context: StageCallContext,
) => Promise<Result<unknown, AppBoundaryError>>;

export type StageHandlers = {
  [S in StageName]: StageHandler<S>;
};

export type SignalIntakeRequest = {
  type: string;
  subject: string;
  payload: Record<string, unknown>;
  discoveredAt?: Date;
};

export type FeedbackRequest = {
  insightId: string;
  starRating: number;
  tags?: string[];
  comment?: string;
  invested?: boolean;
  outcomeReturn?: number;
  outcomeDate?: Date;
};

export type CompanyRequest = {
  symbol: string;
  name: string;
  sector?: string;
  industry?: string;
  marketCap?: number;
  fundamentals?: Record<string, unknown>;
};
