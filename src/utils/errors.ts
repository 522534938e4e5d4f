import type { Platform, Target } from '@/types/social';

export type ProviderErrorKind = 'network' | 'auth' | 'rate_limit' | 'http' | 'unparseable';

export class ProviderError extends Error {
  public readonly kind: ProviderErrorKind;
  public readonly status?: number;
  public readonly attempts: number;

  constructor(kind: ProviderErrorKind, message: string, status?: number, attempts = 1) {
    super(message);
    this.name = 'ProviderError';
    this.kind = kind;
    this.status = status;
    this.attempts = attempts;
  }
}

/** A request that never produced a response, after `attempts` tries. */
export class RequestError extends Error {
  public readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'RequestError';
    this.attempts = attempts;
  }
}

export class FetchError extends Error {
  public readonly target: Target;

  constructor(target: Target, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to fetch ${target.platform}:${target.handle}: ${reason}`, { cause });
    this.name = 'FetchError';
    this.target = target;
  }
}

export class SendError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SendError';
  }
}

export class DeleteError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DeleteError';
  }
}

export class MalformedPostError extends Error {
  constructor(platform: Platform, reason: string) {
    super(`Malformed ${platform} post: ${reason}`);
    this.name = 'MalformedPostError';
  }
}

export class MalformedPayloadError extends Error {
  constructor(platform: Platform, reason: string) {
    super(`Unusable ${platform} payload: ${reason}`);
    this.name = 'MalformedPayloadError';
  }
}

export class InvalidHandleError extends Error {
  public readonly input: string;

  constructor(input: string) {
    super(`Invalid account handle: ${input}`);
    this.name = 'InvalidHandleError';
    this.input = input;
  }
}
