export class MalformedRowError extends Error {
  constructor(
    readonly rowNumber: number,
    readonly column: string,
    reason: string,
  ) {
    super(`Row ${rowNumber}, column "${column}": ${reason}`);
    this.name = 'MalformedRowError';
  }
}

export class EmptyDatasetError extends Error {
  constructor(message = 'Bill file contains no transactions') {
    super(message);
    this.name = 'EmptyDatasetError';
  }
}

/** Raised while validating a selection; SelectionState catches it and falls back to a default. */
export class InvalidSelectionError extends Error {
  constructor(
    readonly field: 'year' | 'category' | 'subCategories' | 'displayMode',
    readonly value: unknown,
  ) {
    super(`Invalid ${field} selection: ${JSON.stringify(value)}`);
    this.name = 'InvalidSelectionError';
  }
}

export class UnknownSessionError extends Error {
  constructor(readonly sessionId: string) {
    super(`Dashboard session ${sessionId} does not exist`);
    this.name = 'UnknownSessionError';
  }
}

export class UnknownChartError extends Error {
  constructor(readonly chartId: string) {
    super(`Chart ${chartId} is not part of this dashboard`);
    this.name = 'UnknownChartError';
  }
}
