import { NoSuchKey, S3Client } from "@aws-sdk/client-s3";
import { afterEach, describe, expect, it, vi } from "vitest";
import { MalformedResponseError, NotFoundError } from "./errors";
import { PREVIOUS_RESULTS_KEY, S3BlobStore, SeenSetStore, type BlobStore } from "./storage";

class MemoryBlobStore implements BlobStore {
  objects = new Map<string, string>();

  async getObject(key: string): Promise<string> {
    const body = this.objects.get(key);
    if (body === undefined) throw new NotFoundError(key);
    return body;
  }

  async putObject(key: string, body: string): Promise<void> {
    this.objects.set(key, body);
  }
}

const a = { uri: "/repositories/2/resources/1", title: "A" };
const b = { uri: "/repositories/2/resources/2", title: "B" };

describe("SeenSetStore", () => {
  it("treats a missing key as an empty set", async () => {
    await expect(new SeenSetStore(new MemoryBlobStore()).load()).resolves.toEqual([]);
  });

  it("writes JSON under results.json and reads it back", async () => {
    const blobs = new MemoryBlobStore();
    const store = new SeenSetStore(blobs);

    await store.save([a, b]);

    expect(PREVIOUS_RESULTS_KEY).toBe("results.json");
    expect(blobs.objects.get("results.json")).toBe(JSON.stringify([a, b]));
    await expect(store.load()).resolves.toEqual([a, b]);
  });

  it("leaves stored content unchanged on save(load())", async () => {
    const blobs = new MemoryBlobStore();
    const stored = '[{"uri":"/repositories/2/resources/1","title":"A","primary_type":"resource"}]';
    blobs.objects.set("results.json", stored);
    const store = new SeenSetStore(blobs);

    await store.save(await store.load());

    expect(blobs.objects.get("results.json")).toBe(stored);
  });

  it("overwrites rather than merges", async () => {
    const blobs = new MemoryBlobStore();
    const store = new SeenSetStore(blobs);
    await store.save([a]);
    await store.save([b]);
    await expect(store.load()).resolves.toEqual([b]);
  });

  it("rejects a body that is not JSON", async () => {
    const blobs = new MemoryBlobStore();
    blobs.objects.set("results.json", "not json");
    await expect(new SeenSetStore(blobs).load()).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("rejects JSON that is not a list of records", async () => {
    const blobs = new MemoryBlobStore();
    blobs.objects.set("results.json", '{"uri":"/repositories/2/resources/1"}');
    await expect(new SeenSetStore(blobs).load()).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("propagates other storage failures", async () => {
    const failing: BlobStore = {
      getObject: async () => {
        throw new Error("AccessDenied");
      },
      putObject: async () => undefined,
    };
    await expect(new SeenSetStore(failing).load()).rejects.toThrow("AccessDenied");
  });
});

describe("S3BlobStore", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps NoSuchKey to NotFoundError", async () => {
    vi.spyOn(S3Client.prototype, "send").mockRejectedValueOnce(
      new NoSuchKey({ message: "The specified key does not exist.", $metadata: {} })
    );
    const store = new S3BlobStore(new S3Client({ region: "us-east-1" }), "test-bucket");

    await expect(store.getObject("results.json")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("maps an error named NoSuchKey from another client build", async () => {
    vi.spyOn(S3Client.prototype, "send").mockRejectedValueOnce(
      Object.assign(new Error("missing"), { name: "NoSuchKey" })
    );
    const store = new S3BlobStore(new S3Client({ region: "us-east-1" }), "test-bucket");

    await expect(store.getObject("results.json")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("passes other S3 errors through", async () => {
    vi.spyOn(S3Client.prototype, "send").mockRejectedValueOnce(
      Object.assign(new Error("Access Denied"), { name: "AccessDenied" })
    );
    const store = new S3BlobStore(new S3Client({ region: "us-east-1" }), "test-bucket");

    await expect(store.getObject("results.json")).rejects.toThrow("Access Denied");
  });
});
