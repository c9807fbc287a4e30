export type PlanformInputIssue = {
  field: string;
  message: string;
};

export class TooManyArgumentsError extends Error {
  readonly received: number;

  constructor(received: number) {
    super(`Too many input arguments: expected at most 1 planform record, received ${received}`);
    this.name = 'TooManyArgumentsError';
    this.received = received;
  }
}

export class InvalidInputError extends Error {
  constructor(
    message: string,
    readonly issues: PlanformInputIssue[] = [],
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class UnsupportedTopologyError extends Error {
  readonly componentCount: number;

  constructor(componentCount: number) {
    super(`Planform component count ${componentCount} not allowed (expected 4 or 6)`);
    this.name = 'UnsupportedTopologyError';
    this.componentCount = componentCount;
  }
}
