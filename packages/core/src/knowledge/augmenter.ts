import { SingleFlight } from "../cache";
import { errorMessage, GatewayError, toError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import type { RetrievalResult, RetrievalService, RetrievalSource } from "../provider/types";
import { directiveTokens, latestUserMessage, stripDirective, userText } from "../translate/directives";
import type { ChatMessage, DocumentPart, Reference } from "../types";

export interface RetrievalOptions {
  /** Results scoring below this are discarded */
  minScore: number;
  /** Above this many matched documents, all text is combined into one */
  maxSeparateDocuments: number;
  topK: number;
  /** Query text is cut to this many characters */
  queryLimit: number;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  minScore: 0.5,
  maxSeparateDocuments: 5,
  topK: 50,
  queryLimit: 998,
};

export interface Augmentation {
  messages: ChatMessage[];
  references: Reference[];
}

interface MatchedDocument {
  text: string;
  url?: string;
}

const COMBINED_DOCUMENT_NAME = "combined";

/**
 * Grounds the latest user message in retrieved documents when it names a
 * retrieval source as `@<source-name>`. Tokens naming no known source are
 * left as plain text.
 */
export class RetrievalAugmenter {
  private readonly sources: SingleFlight<RetrievalSource[]>;
  private readonly options: RetrievalOptions;

  constructor(
    private readonly service: RetrievalService,
    options: Partial<RetrievalOptions> = {},
    private readonly logger: Logger = silentLogger,
  ) {
    this.options = { ...DEFAULT_RETRIEVAL_OPTIONS, ...options };
    this.sources = new SingleFlight(() => this.service.listSources());
  }

  async augment(messages: ChatMessage[], signal?: AbortSignal): Promise<Augmentation> {
    const latest = latestUserMessage(messages);
    if (!latest) return { messages, references: [] };

    const text = userText(latest.message);
    const tokens = directiveTokens(text);
    // No directive at all: skip the source listing round-trip
    if (tokens.size === 0) return { messages, references: [] };

    const matching = (await this.listSources()).filter((source) => tokens.has(`@${source.name}`));
    if (matching.length === 0) return { messages, references: [] };

    // Keyed by title; a later result with the same title replaces the earlier one
    const documents = new Map<string, MatchedDocument>();
    for (const source of matching) {
      const query = stripDirective(text, `@${source.name}`).slice(0, this.options.queryLimit);
      this.logger.info(`Using knowledge source ${source.name}`, { queryLength: query.length });

      let results: RetrievalResult[];
      try {
        results = await this.service.retrieve(query, source.ref, this.options.topK, { signal });
      } catch (err) {
        throw new GatewayError(`Retrieval from ${source.name} failed: ${errorMessage(err)}`, "upstream", toError(err));
      }
      this.logger.debug(`Retrieved ${results.length} results from ${source.name}`);

      results.forEach((result, i) => {
        if (result.score < this.options.minScore) return;
        const title = result.title ?? result.uri ?? `${source.name} result ${i + 1}`;
        documents.set(title, { text: result.text.trim(), url: result.uri });
      });
    }

    if (documents.size === 0) return { messages, references: [] };

    const augmented = [...messages];
    augmented[latest.index] = {
      role: "user",
      content: [...latest.message.content, ...this.toDocumentParts(documents)],
    };

    const references: Reference[] = [];
    for (const [title, doc] of documents) {
      if (doc.url !== undefined) references.push({ title, url: doc.url });
    }
    return { messages: augmented, references };
  }

  private toDocumentParts(documents: Map<string, MatchedDocument>): DocumentPart[] {
    if (documents.size <= this.options.maxSeparateDocuments) {
      return [...documents].map(([title, doc]) => ({ type: "document", name: title, text: doc.text }));
    }
    const combined = [...documents.values()].map((doc) => doc.text).join("\n");
    return [{ type: "document", name: COMBINED_DOCUMENT_NAME, text: combined }];
  }

  private async listSources(): Promise<RetrievalSource[]> {
    try {
      return await this.sources.get();
    } catch (err) {
      throw new GatewayError(`Unable to list knowledge sources: ${errorMessage(err)}`, "upstream", toError(err));
    }
  }
}
