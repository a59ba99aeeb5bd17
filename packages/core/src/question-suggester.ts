import { z } from "zod";
import type { IDocumentStore } from "@docsift/db";
import { NotFoundError } from "@docsift/errors";
import { loadJsonResource } from "@docsift/config";
import { createChildLogger, createSilentLogger, type Logger } from "@docsift/logger";

const templatesSchema = z.object({
  contentSampleChunks: z.number().int().positive(),
  contentSampleChars: z.number().int().positive(),
  contentTypes: z.array(z.string()),
  types: z.array(
    z.object({
      type: z.string(),
      keywords: z.array(z.string()),
      questions: z.array(z.string()).length(8),
    }),
  ),
});

const TEMPLATES = loadJsonResource(new URL("../data/question-templates.json", import.meta.url), templatesSchema);
const GENERIC_TYPE = "generic";

export interface QuestionSuggestions {
  documentType: string;
  questions: string[];
}

function matchType(text: string, allowed?: readonly string[]): string | undefined {
  const lower = text.toLowerCase();
  return TEMPLATES.types.find(
    ({ type, keywords }) =>
      (allowed === undefined || allowed.includes(type)) && keywords.some((keyword) => lower.includes(keyword)),
  )?.type;
}

export function questionsFor(documentType: string): string[] {
  const template =
    TEMPLATES.types.find(({ type }) => type === documentType) ??
    TEMPLATES.types.find(({ type }) => type === GENERIC_TYPE);
  return template ? [...template.questions] : [];
}

/**
 * Picks a document type from the title, then from the opening text, and
 * attaches that type's question templates to the document metadata.
 */
export class QuestionSuggester {
  private readonly documents: IDocumentStore;
  private readonly logger: Logger;

  constructor(documents: IDocumentStore, logger?: Logger) {
    this.documents = documents;
    this.logger = createChildLogger(logger ?? createSilentLogger(), { component: "question-suggester" });
  }

  /** Title keywords cover every type; the content sample only the narrower ones. */
  detectDocumentType(title: string, contentSample = ""): string {
    return matchType(title) ?? matchType(contentSample, TEMPLATES.contentTypes) ?? GENERIC_TYPE;
  }

  async suggest(tenant: string, documentId: string): Promise<QuestionSuggestions> {
    const document = await this.documents.getDocument(tenant, documentId);
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }

    const opening = await this.documents.listChunks(tenant, documentId, {
      offset: 0,
      limit: TEMPLATES.contentSampleChunks,
    });
    const sample = opening.map((chunk) => chunk.content.slice(0, TEMPLATES.contentSampleChars)).join(" ");

    const documentType = this.detectDocumentType(document.title, sample);
    const questions = questionsFor(documentType);

    await this.documents.updateMetadata(tenant, documentId, {
      suggestedQuestions: questions,
      documentType,
      suggestionsGeneratedAt: new Date().toISOString(),
    });
    this.logger.debug({ documentId, documentType }, "suggested questions attached");
    return { documentType, questions };
  }
}
