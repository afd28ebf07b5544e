export * from './create-feedback.dto';
export * from './dispute-feedback.dto';
export * from './list-feedback-query.dto';
