import path from "node:path";
import { getDependencies } from "../src/infrastructure/container";
import { convertAlignmentToSrt } from "../src/application/alignmentService";
import { parseArgs, stringArg } from "../lib/cliArgs";

// Usage: npx tsx scripts/toSrt.ts --input=./out/alignment.json --output=./out/alignment.srt

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const input = stringArg(args, "input");
  const output = stringArg(args, "output");
  if (!input || !output) {
    console.error("Usage: to-srt --input=<alignment.json> --output=<file.srt>");
    process.exit(1);
  }

  const { storage, subtitles } = getDependencies();
  const written = await convertAlignmentToSrt(path.resolve(input), path.resolve(output), { storage, subtitles });
  console.log(`Subtitles saved to ${written}.`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
