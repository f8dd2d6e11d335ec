import { describe, it, expect, vi, beforeEach } from "vitest";
import type { DeindexJobData, IndexJobData } from "@ragweave/types";

const { MockQueue, mockAdd, mockClose } = vi.hoisted(() => {
  const mockAdd = vi.fn(async (_name: string, _data: unknown) => ({ id: "job-1" }));
  const mockClose = vi.fn(async () => {});
  const MockQueue = vi.fn((_name: string, _options: unknown) => ({ add: mockAdd, close: mockClose }));
  return { MockQueue, mockAdd, mockClose };
});

vi.mock("bullmq", () => ({ Queue: MockQueue }));

import { DLQ_NAME, createDeadLetterQueue } from "./dlq.js";
import {
  DEFAULT_JOB_OPTIONS,
  QUEUE_NAMES,
  closeQueues,
  createQueues,
  enqueueDeindex,
  enqueueIndex,
} from "./queues.js";

const connection = { host: "localhost", port: 6379 };

const indexJob: IndexJobData = {
  type: "index",
  namespace: "u1",
  strategyId: "RAG-vanilla-v1",
  strategyConfig: {},
  documents: [{ content: "hello", metadata: {} }],
};

const deindexJob: DeindexJobData = {
  type: "deindex",
  namespace: "u1",
  strategyId: "RAG-vanilla-v1",
  strategyConfig: {},
  deleteAll: true,
};

describe("createQueues", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("creates the index and deindex queues with retrying defaults", () => {
    createQueues({ connection });

    expect(MockQueue).toHaveBeenCalledWith(QUEUE_NAMES.INDEX, {
      connection,
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });
    expect(MockQueue).toHaveBeenCalledWith(QUEUE_NAMES.DEINDEX, {
      connection,
      defaultJobOptions: { ...DEFAULT_JOB_OPTIONS, priority: 1 },
    });
    expect(DEFAULT_JOB_OPTIONS.attempts).toBe(3);
    expect(DEFAULT_JOB_OPTIONS.backoff.type).toBe("exponential");
  });

  it("enqueues jobs under their job names", async () => {
    const queues = createQueues({ connection });

    await expect(enqueueIndex(queues, indexJob)).resolves.toBe("job-1");
    await expect(enqueueDeindex(queues, deindexJob)).resolves.toBe("job-1");

    expect(mockAdd.mock.calls).toEqual([
      ["index", indexJob],
      ["deindex", deindexJob],
    ]);
  });

  it("closes both queues", async () => {
    await closeQueues(createQueues({ connection }));

    expect(mockClose).toHaveBeenCalledTimes(2);
  });
});

describe("createDeadLetterQueue", () => {
  it("keeps every dead-lettered job", () => {
    createDeadLetterQueue(connection);

    expect(MockQueue).toHaveBeenLastCalledWith(DLQ_NAME, {
      connection,
      defaultJobOptions: { removeOnComplete: false, removeOnFail: false },
    });
  });
});
