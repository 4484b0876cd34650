export class DecodeError extends Error {
  constructor(public readonly reason: string) {
    super(`failed to decode: ${reason}`);
    this.name = 'DecodeError';
  }
}

export class NotReadyError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} is not yet complete`);
    this.name = 'NotReadyError';
  }
}

export class InvalidJobIdError extends Error {
  constructor(public readonly jobId: string) {
    super(`Invalid job id: ${JSON.stringify(jobId)}`);
    this.name = 'InvalidJobIdError';
  }
}

export class BrokerUnavailableError extends Error {
  constructor(
    public readonly operation: 'enqueue' | 'consume' | 'schema',
    cause: unknown,
  ) {
    super(`Broker unavailable during ${operation}: ${describe(cause)}`, {
      cause,
    });
    this.name = 'BrokerUnavailableError';
  }
}

export class StoreUnavailableError extends Error {
  constructor(
    public readonly operation: 'read' | 'write' | 'schema',
    cause: unknown,
  ) {
    super(`Job store unavailable during ${operation}: ${describe(cause)}`, {
      cause,
    });
    this.name = 'StoreUnavailableError';
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
