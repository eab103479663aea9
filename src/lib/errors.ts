/**
 * Error kinds surfaced by the risk core. Any of these prevents a
 * RiskAssessment from being returned; there is no partial result.
 */

export type RiskEngineErrorCode = "INVALID_PANEL" | "MODEL_UNAVAILABLE";

export interface PanelIssue {
  /** Dotted path of the offending field, e.g. "stage" or "extended_markers.KRAS". */
  field: string;
  message: string;
}

export interface RiskEngineErrorDetails {
  issues?: PanelIssue[];
  modelVersion?: string;
  value?: unknown;
}

export abstract class RiskEngineError extends Error {
  abstract readonly code: RiskEngineErrorCode;
  readonly details: Readonly<RiskEngineErrorDetails>;

  constructor(message: string, details: RiskEngineErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.details = Object.freeze(details);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/** A required field is missing or a categorical field is outside its vocabulary. */
export class InvalidPanelError extends RiskEngineError {
  readonly code = "INVALID_PANEL" as const;

  constructor(message: string, details: RiskEngineErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, details, options);
    this.name = "InvalidPanelError";
    Object.setPrototypeOf(this, InvalidPanelError.prototype);
  }

  get issues(): PanelIssue[] {
    return this.details.issues ?? [];
  }
}

/**
 * The recurrence model could not produce a usable probability: not loaded,
 * wrong encoding version, inference failure, or output outside [0, 1].
 * Never substituted with the stage-based estimate.
 */
export class ModelUnavailableError extends RiskEngineError {
  readonly code = "MODEL_UNAVAILABLE" as const;

  constructor(message: string, details: RiskEngineErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, details, options);
    this.name = "ModelUnavailableError";
    Object.setPrototypeOf(this, ModelUnavailableError.prototype);
  }
}

export function isRiskEngineError(err: unknown): err is RiskEngineError {
  return err instanceof RiskEngineError;
}
