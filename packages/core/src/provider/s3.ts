import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { ObjectStore } from "./types";

export function createS3Client(options: { region?: string } = {}): S3Client {
  return new S3Client({ region: options.region });
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  async get(bucket: string, key: string): Promise<Uint8Array> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new Error(`Object ${bucket}/${key} has no body`);
    }
    return response.Body.transformToByteArray();
  }
}
