import type { ReportKind } from './types.js';

// ─── Pipeline Error Classes ───

/** Malformed configuration or channel list. Fatal: raised before any API call. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class AmbiguousReferenceError extends Error {
  constructor(
    message: string,
    public identifiers: string[],
  ) {
    super(message);
    this.name = 'AmbiguousReferenceError';
  }
}

export class ChannelNotFoundError extends Error {
  constructor(
    message: string,
    public ref: string,
  ) {
    super(message);
    this.name = 'ChannelNotFoundError';
  }
}

export type FetchStage = 'list' | 'details';

export class FetchError extends Error {
  constructor(
    message: string,
    public channelId: string,
    public stage: FetchStage,
    public batchIndex: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export class ExportError extends Error {
  constructor(
    message: string,
    public kind: ReportKind,
    public fileName: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExportError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
