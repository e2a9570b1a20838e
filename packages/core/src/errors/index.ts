/**
 * Custom Error Classes
 */

/**
 * Base error class for all clicksynth errors
 */
export class ClicksynthError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ClicksynthError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unrecognized or corrupt replay data
 */
export class FormatError extends ClicksynthError {
  public readonly format: string;

  constructor(format: string, expected: string, found: string) {
    super(
      `Invalid ${format} replay: expected ${expected}, found ${found}`,
      'FORMAT_ERROR',
      { format, expected, found }
    );
    this.name = 'FormatError';
    this.format = format;
  }
}

/**
 * Invalid time or frame data while building a timeline
 */
export class TimelineError extends ClicksynthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMELINE_ERROR', details);
    this.name = 'TimelineError';
  }
}

/**
 * A single clickpack file failed to decode
 */
export class SampleDecodeError extends ClicksynthError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(
      `Failed to decode ${filePath}: ${reason}`,
      'SAMPLE_DECODE_ERROR',
      { filePath, reason }
    );
    this.name = 'SampleDecodeError';
    this.filePath = filePath;
  }
}

/**
 * Clickpack directory is unusable as a whole
 */
export class ClickpackError extends ClicksynthError {
  constructor(path: string, message: string) {
    super(`${message}: ${path}`, 'CLICKPACK_ERROR', { path });
    this.name = 'ClickpackError';
  }
}

export type RenderStage = 'plan' | 'resample' | 'mix' | 'noise' | 'finalize';

/**
 * Render aborted
 */
export class RenderError extends ClicksynthError {
  public readonly stage: RenderStage;
  public readonly actionIndex?: number;

  constructor(stage: RenderStage, message: string, actionIndex?: number) {
    super(
      actionIndex === undefined
        ? `Render failed during ${stage}: ${message}`
        : `Render failed during ${stage} at action #${actionIndex}: ${message}`,
      'RENDER_ERROR',
      { stage, actionIndex }
    );
    this.name = 'RenderError';
    this.stage = stage;
    this.actionIndex = actionIndex;
  }
}

/**
 * Render stopped by its abort signal
 */
export class RenderCancelledError extends RenderError {
  constructor(stage: RenderStage) {
    super(stage, 'cancelled');
    this.name = 'RenderCancelledError';
  }
}

/**
 * Output file could not be written
 */
export class OutputError extends ClicksynthError {
  constructor(path: string, cause: unknown) {
    super(
      `Failed to write output ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'OUTPUT_ERROR',
      { path }
    );
    this.name = 'OutputError';
  }
}

/**
 * Validation error for invalid render settings
 */
export class ConfigValidationError extends ClicksynthError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ConfigValidationError';
  }
}
