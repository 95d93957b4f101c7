import { GetObjectCommand, NoSuchKey, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { z } from "zod";
import { MalformedResponseError, NotFoundError } from "./errors";
import type { SeenSet } from "./notifier/types";

export const PREVIOUS_RESULTS_KEY = "results.json";

export type BlobStore = {
  /** UTF-8 body of `key`. Throws NotFoundError when the key does not exist. */
  getObject(key: string): Promise<string>;
  putObject(key: string, body: string): Promise<void>;
};

export type S3StoreConfig = {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
};

export function createS3Client(config: S3StoreConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.endpoint ? true : undefined,
    // Fall back to the default provider chain (role, profile) without explicit keys
    credentials:
      config.accessKeyId && config.secretAccessKey
        ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
        : undefined,
  });
}

function isMissingKey(err: unknown): boolean {
  if (err instanceof NoSuchKey) return true;
  return err instanceof Error && err.name === "NoSuchKey";
}

export class S3BlobStore implements BlobStore {
  private s3: S3Client;
  private bucket: string;

  constructor(s3: S3Client, bucket: string) {
    this.s3 = s3;
    this.bucket = bucket;
  }

  async getObject(key: string): Promise<string> {
    const resp = await this.s3
      .send(new GetObjectCommand({ Bucket: this.bucket, Key: key }))
      .catch((err: unknown) => {
        if (isMissingKey(err)) throw new NotFoundError(key);
        throw err;
      });
    if (!resp.Body) throw new NotFoundError(key);
    return resp.Body.transformToString("utf-8");
  }

  async putObject(key: string, body: string): Promise<void> {
    await this.s3.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: Buffer.from(body, "utf-8"),
        ContentType: "application/json",
      })
    );
  }
}

const seenSetSchema = z.array(z.object({ uri: z.string(), title: z.string() }).passthrough());

/**
 * Previously reported records, kept as one JSON document under a fixed key.
 * Single writer: save() overwrites whatever is there.
 */
export class SeenSetStore {
  private blobs: BlobStore;
  private key: string;

  constructor(blobs: BlobStore, key: string = PREVIOUS_RESULTS_KEY) {
    this.blobs = blobs;
    this.key = key;
  }

  /** A missing key is a first run: the empty set. */
  async load(): Promise<SeenSet> {
    let body: string;
    try {
      body = await this.blobs.getObject(this.key);
    } catch (err) {
      if (err instanceof NotFoundError) return [];
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new MalformedResponseError("seen-set store", `${this.key} is not valid JSON`);
    }
    const parsed = seenSetSchema.safeParse(json);
    if (!parsed.success) {
      throw new MalformedResponseError("seen-set store", `${this.key} is not a list of records`);
    }
    return parsed.data;
  }

  async save(records: SeenSet): Promise<void> {
    await this.blobs.putObject(this.key, JSON.stringify(records));
  }
}
