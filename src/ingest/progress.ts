import type { IngestProgress, IngestResult } from "./types.js";

const PHASE_LABELS: Record<IngestProgress["phase"], string> = {
  scanning: "🔍 Scanning",
  parsing: "📄 Parsing",
  storing: "💾 Classifying",
};

const LINE_WIDTH = 80;
const FILE_WIDTH = 36;

function shortenPath(path: string): string {
  return path.length > FILE_WIDTH ? `...${path.slice(-(FILE_WIDTH - 3))}` : path;
}

/**
 * Single status line on stderr while notes are ingested, then a summary of
 * what the conflict resolver did with the chunks.
 */
export class ProgressReporter {
  private startedAt = 0;
  private lastDraw = 0;

  constructor(private readonly throttleMs = 100) {}

  start(): void {
    this.startedAt = Date.now();
    this.lastDraw = 0;
  }

  update(progress: IngestProgress): void {
    const now = Date.now();
    const isLast = progress.total > 0 && progress.current === progress.total;
    if (!isLast && now - this.lastDraw < this.throttleMs) {
      return;
    }
    this.lastDraw = now;

    const parts = [`${PHASE_LABELS[progress.phase]} ${progress.current}/${progress.total}`];
    if (progress.currentFile) parts.push(shortenPath(progress.currentFile));
    if (progress.description) parts.push(`(${progress.description})`);

    process.stderr.write(`\r${parts.join(" ").padEnd(LINE_WIDTH)}`);
  }

  finish(result: IngestResult): void {
    this.clearLine();

    const elapsedMs = this.startedAt > 0 ? Date.now() - this.startedAt : result.duration;
    const { insert_new, merge_into, supersede } = result.actions;
    console.log(`\n✓ ${result.scanned} file(s), ${result.chunks} chunk(s) in ${(elapsedMs / 1000).toFixed(1)}s`);
    console.log(`  • New items: ${insert_new}`);
    console.log(`  • Merged into existing: ${merge_into}`);
    if (supersede > 0) {
      console.log(`  • Superseded older items: ${supersede}`);
    }

    if (result.errors.length > 0) {
      console.log(`\n⚠️  ${result.errors.length} file(s) failed:`);
      for (const failure of result.errors.slice(0, 5)) {
        console.log(`  • ${failure.file}: ${failure.error}`);
      }
      if (result.errors.length > 5) {
        console.log(`  ... and ${result.errors.length - 5} more`);
      }
    }
  }

  private clearLine(): void {
    process.stderr.write(`\r${" ".repeat(LINE_WIDTH)}\r`);
  }
}
