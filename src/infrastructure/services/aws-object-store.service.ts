import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  S3Client,
} from "@aws-sdk/client-s3";
import {
  IObjectStoreClient,
  StoredObject,
} from "../../core/domain/services/object-store.service.js";

export interface AwsObjectStoreOptions {
  region: string;
  endpoint?: string;
  forcePathStyle?: boolean;
}

export class AwsObjectStoreClient implements IObjectStoreClient {
  private s3Client: S3Client;

  constructor(options: AwsObjectStoreOptions) {
    this.s3Client = new S3Client({
      region: options.region,
      endpoint: options.endpoint,
      forcePathStyle: options.forcePathStyle,
    });
  }

  async listObjects(bucket: string, prefix: string): Promise<StoredObject[]> {
    const objects: StoredObject[] = [];
    let continuationToken: string | undefined;
    do {
      const out = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          Prefix: prefix || undefined,
          Delimiter: "/",
          ContinuationToken: continuationToken,
        }),
      );
      for (const obj of out.Contents ?? []) {
        if (obj.Key) {
          objects.push({
            key: obj.Key,
            lastModified: obj.LastModified?.getTime() ?? 0,
          });
        }
      }
      continuationToken = out.NextContinuationToken;
    } while (continuationToken);
    return objects;
  }

  async getObjectText(bucket: string, key: string): Promise<string> {
    const response = await this.s3Client.send(
      new GetObjectCommand({ Bucket: bucket, Key: key }),
    );
    if (!response.Body) throw new Error(`No body for s3://${bucket}/${key}`);
    return response.Body.transformToString("utf-8");
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    await this.s3Client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }
}
