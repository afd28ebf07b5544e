import { ResolutionStatus } from '../constants/feedback.constants';

export interface FeedbackMessageContext {
  authorUsername: string;
  recipientUsername: string;
  rating: number;
  role: string;
  ticketNumber: string;
  comment: string | null;
}

export interface MessageContent {
  title: string;
  body: string;
}

function describeComment(comment: string | null): string {
  return comment && comment.trim() !== '' ? comment : '(no comment)';
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function feedbackReceivedMessage(context: FeedbackMessageContext): MessageContent {
  return {
    title: `New Feedback Received - Ticket ${context.ticketNumber}`,
    body: [
      `Hello @${context.recipientUsername},`,
      '',
      `You have received new feedback from @${context.authorUsername}.`,
      '',
      `**Rating:** ${context.rating}/5 stars`,
      `**Role:** ${capitalize(context.role)}`,
      `**Ticket:** ${context.ticketNumber}`,
      `**Comment:** ${describeComment(context.comment)}`,
      '',
      `You can view your feedback at: /u/${context.recipientUsername}`,
      '',
      'If you believe this feedback is unfair, you can dispute it from your profile.',
    ].join('\n'),
  };
}

export function disputeResolvedMessage(
  context: FeedbackMessageContext,
  status: ResolutionStatus,
): MessageContent {
  const verdict =
    status === ResolutionStatus.Accepted
      ? 'Your dispute has been **accepted**. The feedback has been removed from your profile.'
      : 'Your dispute has been **rejected**. The feedback will remain on your profile. This feedback cannot be disputed again.';

  return {
    title: `Feedback Dispute Resolved - Ticket ${context.ticketNumber}`,
    body: [
      `Hello @${context.recipientUsername},`,
      '',
      verdict,
      '',
      '**Original Feedback:**',
      `- From: @${context.authorUsername}`,
      `- Rating: ${context.rating}/5 stars`,
      `- Ticket: ${context.ticketNumber}`,
      `- Comment: ${describeComment(context.comment)}`,
      '',
      'If you have any questions, please contact an administrator.',
    ].join('\n'),
  };
}
