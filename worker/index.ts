import { Worker } from "bullmq";
import IORedis from "ioredis";
import { getQueueName, PROCESS_VIDEO_JOB, ProcessVideoJobSchema } from "../src/infrastructure/queue/redisQueue";
import { getConfig, getDependencies } from "../src/infrastructure/container";
import { processVideo } from "../src/application/alignmentService";

startWorker();

function startWorker() {
  const config = getConfig();
  const connection = new IORedis(config.redisUrl, { maxRetriesPerRequest: null });
  const deps = getDependencies();

  const worker = new Worker(
    getQueueName(),
    async (job) => {
      if (job.name !== PROCESS_VIDEO_JOB) {
        throw new Error(`Unknown job type: ${job.name}`);
      }
      const payload = ProcessVideoJobSchema.parse(job.data);
      const result = await processVideo(payload, deps);
      return { alignmentPath: result.alignmentPath, metadataPath: result.metadataPath, srtPath: result.srtPath };
    },
    { connection, concurrency: config.workerConcurrency }
  );

  worker.on("failed", (job, err) => {
    console.error("Job failed", job?.id, err);
  });

  worker.on("error", (err) => {
    console.error("Worker error", err);
  });

  const shutdown = async () => {
    await worker.close();
    await connection.quit();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("Worker shutdown failed", err);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  console.log(`Frame align worker running (pid=${process.pid}, concurrency=${config.workerConcurrency}).`);
}
