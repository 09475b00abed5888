import { getLogger, Logger } from "./logger";

export function truncateText(text: string, maxLength = 500): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + "...";
}

export function cleanTextForJson(text: string): string {
  if (!text) return "";
  return text.replace(/\x00/g, "").replace(/\r\n?/g, "\n").trim();
}

export function safeFilename(filename: string): string {
  let safe = filename.replace(/[<>:"/\\|?*]/g, "_").replace(/\s+/g, "_");
  if (safe.length > 200) {
    const tail = safe.slice(-10);
    safe = safe.slice(0, 190) + (tail.includes(".") ? tail : "");
  }
  return safe;
}

export function formatFileSize(bytes: number): string {
  if (bytes === 0) return "0B";
  const units = ["B", "KB", "MB", "GB"];
  let size = bytes;
  let i = 0;
  while (size >= 1024 && i < units.length - 1) {
    size /= 1024;
    i++;
  }
  return `${size.toFixed(1)}${units[i]}`;
}

export class ProgressTracker {
  private current = 0;

  constructor(
    private readonly total: number,
    private readonly description = "Processing",
    private readonly log: Logger = getLogger("core")
  ) {}

  update(increment = 1): number {
    this.current += increment;
    const pct = this.total ? (this.current / this.total) * 100 : 100;
    this.log.info(`${this.description}: ${this.current}/${this.total} (${pct.toFixed(1)}%)`);
    return this.current;
  }

  finish(): void {
    this.log.info(`${this.description}: Completed (${this.total}/${this.total})`);
  }
}
