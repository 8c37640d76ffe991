export class UnknownActionKindError extends Error {
  constructor(readonly kind: string, known: readonly string[]) {
    super(`Unknown bulk action kind '${kind}'; expected one of: ${known.join(', ')}`);
    this.name = 'UnknownActionKindError';
  }
}

export class InvalidActionParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidActionParamsError';
  }
}

export class BulkJobNotFoundError extends Error {
  constructor(resultId: string) {
    super(`Bulk action '${resultId}' not found`);
    this.name = 'BulkJobNotFoundError';
  }
}

export class BulkJobNotRunningError extends Error {
  constructor(resultId: string, status: string) {
    super(`Bulk action '${resultId}' is not running (status: ${status})`);
    this.name = 'BulkJobNotRunningError';
  }
}
