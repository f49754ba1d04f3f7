import { randomUUID } from "node:crypto";
import { Queue } from "bullmq";
import IORedis from "ioredis";
import { z } from "zod";
import type { ProcessVideoInput } from "../../domain/types";
import type { JobQueuePort } from "../../interfaces/ports";

const QUEUE_NAME = "frame-align";
export const PROCESS_VIDEO_JOB = "processVideo";

export const ProcessVideoJobSchema = z.object({
  runId: z.string().min(1),
  videoPath: z.string().min(1),
  outputDir: z.string().min(1),
  extractionFps: z.number().positive(),
  model: z.string().min(1),
  language: z.string().nullable().optional(),
  subtitles: z.boolean().optional()
});

export type ProcessVideoJob = z.infer<typeof ProcessVideoJobSchema>;

export class RedisQueue implements JobQueuePort {
  private connection: IORedis;
  private queue: Queue;

  constructor(redisUrl: string) {
    this.connection = new IORedis(redisUrl, { maxRetriesPerRequest: null });
    this.queue = new Queue(QUEUE_NAME, { connection: this.connection });
  }

  async enqueueProcessVideo(input: ProcessVideoInput) {
    const payload: ProcessVideoJob = ProcessVideoJobSchema.parse({ ...input, runId: input.runId ?? randomUUID() });
    await this.queue.add(PROCESS_VIDEO_JOB, payload, { jobId: payload.runId, removeOnComplete: 50, removeOnFail: 50 });
    return payload.runId;
  }

  async close() {
    await this.queue.close();
    await this.connection.quit();
  }
}

export function getQueueName() {
  return QUEUE_NAME;
}
