export type FeedbackValidationCode =
  | 'self-feedback'
  | 'duplicate'
  | 'invalid-rating'
  | 'missing-ticket'
  | 'comment-too-long';

export type FeedbackDisputeStateCode = 'already-disputed' | 'dispute-open' | 'not-disputed';

export type FeedbackErrorCode =
  | FeedbackValidationCode
  | FeedbackDisputeStateCode
  | 'not-found'
  | 'forbidden';

export abstract class FeedbackError extends Error {
  abstract readonly code: FeedbackErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class FeedbackValidationError extends FeedbackError {
  constructor(
    readonly code: FeedbackValidationCode,
    message: string,
  ) {
    super(message);
  }
}

export class FeedbackNotFoundError extends FeedbackError {
  readonly code = 'not-found';

  constructor(message = 'Feedback not found') {
    super(message);
  }
}

export class FeedbackAuthorizationError extends FeedbackError {
  readonly code = 'forbidden';

  constructor(message = 'Not authorized') {
    super(message);
  }
}

/**
 * Business-state conflict on a dispute, kept apart from authorization
 * failures so clients can explain it.
 */
export class FeedbackDisputeStateError extends FeedbackError {
  constructor(
    readonly code: FeedbackDisputeStateCode,
    message: string,
  ) {
    super(message);
  }
}

export const ALREADY_DISPUTED_MESSAGE =
  'This feedback has already been disputed and cannot be disputed again.';
