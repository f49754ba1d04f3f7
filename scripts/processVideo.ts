import path from "node:path";
import { createQueue, getConfig, getDependencies } from "../src/infrastructure/container";
import { submitVideo } from "../src/application/alignmentService";
import { numberArg, parseArgs, stringArg } from "../lib/cliArgs";

// Usage examples:
//  - npx tsx scripts/processVideo.ts --video=./samples/talk.mp4 --out=./output/talk
//  - npx tsx scripts/processVideo.ts --video=./talk.mp4 --out=./out --fps=2 --model=medium --language=en --srt
//  - npx tsx scripts/processVideo.ts --video=./talk.mp4 --out=./out --queue (requires a running worker and Redis)

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const video = stringArg(args, "video");
  const out = stringArg(args, "out");
  if (!video || !out) {
    console.error("Usage: process-video --video=<path> --out=<dir> [--fps=1] [--model=small] [--language=xx] [--srt] [--queue]");
    process.exit(1);
  }

  const config = getConfig();
  const deps = getDependencies();
  const queue = args.queue === true ? createQueue() : null;

  try {
    const { runId, result } = await submitVideo(
      {
        videoPath: path.resolve(video),
        outputDir: path.resolve(out),
        extractionFps: numberArg(args, "fps", config.extractionFps),
        model: stringArg(args, "model") ?? config.whisper.model,
        language: stringArg(args, "language") ?? config.whisper.language,
        subtitles: args.srt === true
      },
      deps,
      queue
    );

    if (result) {
      console.log(`Alignment saved to ${result.alignmentPath} (${result.alignment.length} entries).`);
      if (result.srtPath) {
        console.log(`Subtitles saved to ${result.srtPath}.`);
      }
    } else {
      console.log(`Queued run ${runId}.`);
    }
  } finally {
    await queue?.close();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
