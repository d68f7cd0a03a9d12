import { afterEach, describe, it, expect, vi } from "vitest";
import { DeadLetterPublisher } from "./delivery/deadLetter.js";
import { createQueuePublisher, DisabledQueuePublisher, RedisQueuePublisher } from "./queue.js";

function stubRedis() {
  return {
    rpush: vi.fn(async (_key: string, _value: string) => 1),
    quit: vi.fn(async () => "OK"),
  };
}

describe("RedisQueuePublisher", () => {
  it("appends to the named list", async () => {
    const redis = stubRedis();
    const queue = new RedisQueuePublisher(redis);

    await queue.publish("whatsapp_events", '{"type":"Message"}');

    expect(redis.rpush).toHaveBeenCalledWith("whatsapp_events", '{"type":"Message"}');
  });

  it("closes the connection", async () => {
    const redis = stubRedis();
    await new RedisQueuePublisher(redis).close();
    expect(redis.quit).toHaveBeenCalledTimes(1);
  });
});

describe("createQueuePublisher", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("is disabled without a Redis URL", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});

    const queue = createQueuePublisher(undefined);

    expect(queue).toBeInstanceOf(DisabledQueuePublisher);
    expect(queue.enabled).toBe(false);
    await expect(queue.publish("whatsapp_events", "{}")).resolves.toBeUndefined();
  });
});

describe("DeadLetterPublisher", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("serializes the record onto the error queue", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const redis = stubRedis();
    const record = {
      url: "https://hooks.example.test/wa",
      payload: { event: "Message" },
      userID: "tenant-1",
      encryptedHmacKey: "",
      attemptTime: "2026-01-01T00:00:00.000Z",
      errorMessage: "unexpected status code: 500. Body: down",
    };

    await new DeadLetterPublisher(new RedisQueuePublisher(redis), "webhook_errors").publish(record);

    expect(redis.rpush).toHaveBeenCalledWith("webhook_errors", JSON.stringify(record));
  });

  it("logs and swallows publish failures", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const redis = stubRedis();
    redis.rpush.mockRejectedValueOnce(new Error("connection refused"));

    await expect(
      new DeadLetterPublisher(new RedisQueuePublisher(redis), "webhook_errors").publish({
        url: "https://hooks.example.test/wa",
        payload: {},
        userID: "tenant-1",
        encryptedHmacKey: "",
        attemptTime: "2026-01-01T00:00:00.000Z",
        errorMessage: "fetch failed",
      })
    ).resolves.toBeUndefined();
    expect(errors).toHaveBeenCalledTimes(1);
  });
});
