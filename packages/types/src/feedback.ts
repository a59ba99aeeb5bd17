export type FeedbackRating = 1 | -1;

export interface Feedback {
  id: string;
  tenant: string;
  query: string;
  documentId: string | null;
  rating: FeedbackRating;
  comment: string | null;
  createdAt: Date;
}

export interface NewFeedback {
  tenant: string;
  query: string;
  documentId?: string;
  rating: FeedbackRating;
  comment?: string;
}

export interface FeedbackSummary {
  total: number;
  positive: number;
  negative: number;
  positiveRate: number;
}
