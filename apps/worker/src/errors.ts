export class UnknownTaskError extends Error {
  constructor(public readonly taskName: string) {
    super(`unknown task: ${taskName}`);
    this.name = 'UnknownTaskError';
  }
}

export class DuplicateTaskError extends Error {
  constructor(public readonly taskName: string) {
    super(`Task ${taskName} is already registered`);
    this.name = 'DuplicateTaskError';
  }
}

export class FailpointError extends Error {
  constructor() {
    super('failpoint: simulated crash after claim');
    this.name = 'FailpointError';
  }
}
