import { z } from "zod";
import type { Feedback, FeedbackSummary, NewFeedback, TimeWindow } from "@docsift/types";
import type { IDocumentStore, IFeedbackStore } from "@docsift/db";
import { NotFoundError, ValidationError } from "@docsift/errors";
import { createSilentLogger, type Logger } from "@docsift/logger";
import { assertWindow } from "./metrics-recorder.js";

const feedbackSchema = z.object({
  tenant: z.string().min(1),
  query: z.string().trim().min(1).max(2000),
  documentId: z.string().min(1).optional(),
  rating: z.union([z.literal(1), z.literal(-1)]),
  comment: z.string().max(2000).optional(),
});

export interface FeedbackServiceDependencies {
  feedback: IFeedbackStore;
  documents: IDocumentStore;
  logger?: Logger;
}

export class FeedbackService {
  private readonly feedback: IFeedbackStore;
  private readonly documents: IDocumentStore;
  private readonly logger: Logger;

  constructor(deps: FeedbackServiceDependencies) {
    this.feedback = deps.feedback;
    this.documents = deps.documents;
    this.logger = deps.logger ?? createSilentLogger();
  }

  async submit(input: NewFeedback): Promise<Feedback> {
    const parsed = feedbackSchema.safeParse(input);
    if (!parsed.success) {
      const fields: Record<string, string> = {};
      for (const issue of parsed.error.issues) {
        fields[issue.path.join(".") || "feedback"] = issue.message;
      }
      throw new ValidationError("Invalid feedback", fields);
    }

    const { documentId } = parsed.data;
    if (documentId !== undefined && !(await this.documents.getDocument(parsed.data.tenant, documentId))) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }

    const saved = await this.feedback.appendFeedback(parsed.data);
    this.logger.info({ tenant: saved.tenant, rating: saved.rating, documentId: saved.documentId }, "feedback recorded");
    return saved;
  }

  list(tenant: string, window: TimeWindow): Promise<Feedback[]> {
    assertWindow(window);
    return this.feedback.listFeedback(tenant, window);
  }

  summarize(tenant: string, window: TimeWindow): Promise<FeedbackSummary> {
    assertWindow(window);
    return this.feedback.summarizeFeedback(tenant, window);
  }
}
