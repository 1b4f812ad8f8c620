import { BedrockAgentClient, ListKnowledgeBasesCommand } from "@aws-sdk/client-bedrock-agent";
import {
  BedrockAgentRuntimeClient,
  type KnowledgeBaseRetrievalResult,
  RetrieveCommand,
} from "@aws-sdk/client-bedrock-agent-runtime";
import type { CallOptions, RetrievalResult, RetrievalService, RetrievalSource } from "./types";

// Knowledge bases that can serve queries
const QUERYABLE_STATUSES: ReadonlySet<string> = new Set(["ACTIVE", "UPDATING"]);
const TITLE_METADATA_KEY = "x-amz-kendra-document-title";

export function createKnowledgeBaseClients(options: { region?: string } = {}): {
  agent: BedrockAgentClient;
  runtime: BedrockAgentRuntimeClient;
} {
  return {
    agent: new BedrockAgentClient({ region: options.region }),
    runtime: new BedrockAgentRuntimeClient({ region: options.region }),
  };
}

/** Knowledge bases as retrieval sources, addressed by name in user messages. */
export class KnowledgeBaseRetrieval implements RetrievalService {
  constructor(
    private readonly agent: BedrockAgentClient,
    private readonly runtime: BedrockAgentRuntimeClient,
  ) {}

  async listSources(): Promise<RetrievalSource[]> {
    const sources: RetrievalSource[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.agent.send(new ListKnowledgeBasesCommand({ nextToken }));
      for (const summary of page.knowledgeBaseSummaries ?? []) {
        if (summary.name && summary.knowledgeBaseId && summary.status && QUERYABLE_STATUSES.has(summary.status)) {
          sources.push({ name: summary.name, ref: summary.knowledgeBaseId });
        }
      }
      nextToken = page.nextToken;
    } while (nextToken);
    return sources;
  }

  async retrieve(query: string, sourceRef: string, topK: number, options: CallOptions = {}): Promise<RetrievalResult[]> {
    const response = await this.runtime.send(
      new RetrieveCommand({
        knowledgeBaseId: sourceRef,
        retrievalQuery: { text: query },
        retrievalConfiguration: { vectorSearchConfiguration: { numberOfResults: topK } },
      }),
      { abortSignal: options.signal },
    );
    return (response.retrievalResults ?? []).map(toRetrievalResult);
  }
}

function toRetrievalResult(result: KnowledgeBaseRetrievalResult): RetrievalResult {
  const title = result.metadata?.[TITLE_METADATA_KEY];
  const location = result.location;
  const uri = location?.kendraDocumentLocation?.uri ?? location?.webLocation?.url ?? location?.s3Location?.uri;
  return {
    text: result.content?.text ?? "",
    score: result.score ?? 0,
    ...(typeof title === "string" && { title }),
    ...(uri !== undefined && { uri }),
  };
}
