import { InvokeCommand, LambdaClient } from "@aws-sdk/client-lambda";
import type { CallOptions, FunctionService } from "./types";

const DEFAULT_MAX_ATTEMPTS = 5;

export function createLambdaClient(options: { region?: string; maxAttempts?: number } = {}): LambdaClient {
  return new LambdaClient({ region: options.region, maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS });
}

/** Synchronous Lambda invocation. A function-level error is raised, not returned. */
export class LambdaFunctions implements FunctionService {
  constructor(private readonly client: LambdaClient) {}

  async invoke(functionRef: string, payload: Uint8Array, options: CallOptions = {}): Promise<Uint8Array> {
    const response = await this.client.send(
      new InvokeCommand({ FunctionName: functionRef, InvocationType: "RequestResponse", Payload: payload }),
      { abortSignal: options.signal },
    );
    const body = response.Payload ?? new Uint8Array();
    if (response.FunctionError) {
      throw new Error(`${response.FunctionError}: ${new TextDecoder().decode(body)}`);
    }
    return body;
  }
}
