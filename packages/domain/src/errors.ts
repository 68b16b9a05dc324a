import { ReviewDecision } from './types.js';

export class TaxonomyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaxonomyError';
  }
}

export class UnknownFixError extends Error {
  constructor(readonly fixId: string) {
    super(`Unknown fix id: ${fixId}`);
    this.name = 'UnknownFixError';
  }
}

export class ReviewTransitionError extends Error {
  constructor(
    readonly fixId: string,
    readonly from: ReviewDecision,
    readonly to: ReviewDecision
  ) {
    super(`Cannot move fix ${fixId} from ${from} to ${to}`);
    this.name = 'ReviewTransitionError';
  }
}

export class ReviewRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReviewRecordError';
  }
}
