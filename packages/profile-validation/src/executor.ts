/**
 * Backend execution boundary
 *
 * The research agent that searches the web and calls a model lives outside
 * this package. The runner only sees it through a BackendExecutor.
 */

/**
 * One interchangeable execution target (a model/provider configuration)
 */
export interface BackendConfig {
  /** Display name, unique within a run */
  name: string;
  providerId: string;
  /** Opaque to the runner; passed through to the executor */
  connectionParams: Readonly<Record<string, unknown>>;
}

/**
 * Structured profile returned by a backend; one entry per field it filled
 */
export type StructuredProfile = Readonly<Record<string, unknown>>;

export interface BackendRunRequest {
  backend: BackendConfig;
  subjectName: string;
  /** Advisory iteration ceiling (>= 1) */
  maxIterations: number;
  verbose: boolean;
  /** Aborted when the runner gives up on this backend */
  signal: AbortSignal;
}

export interface BackendRunOutput {
  succeeded: boolean;
  wallTimeSeconds: number;
  iterationCount: number;
  rawOutput: string;
  /** null when the backend produced no structured result */
  profile: StructuredProfile | null;
  /** Set when the backend reports an error instead of throwing */
  error?: string;
}

export type BackendExecutor = (
  request: BackendRunRequest
) => Promise<BackendRunOutput> | BackendRunOutput;
