import fs from 'fs';
import { Clock, systemClock } from './clock';

// Sink for one text line per rental transaction outcome
export interface ActivityLog {
  log(message: string): void;
}

const pad = (n: number): string => String(n).padStart(2, '0');

// Local time as "YYYY-MM-DD HH:mm:ss"
export function formatTimestamp(d: Date): string {
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
  return `${date} ${time}`;
}

/**
 * Append-only log file. Writes are synchronous so lines land in call order.
 * Opening throws when the file cannot be opened; callers treat that as fatal.
 */
export class FileActivityLog implements ActivityLog {
  private fd: number | null;

  private constructor(fd: number, private readonly clock: Clock) {
    this.fd = fd;
  }

  static open(filePath: string, clock: Clock = systemClock): FileActivityLog {
    const fd = fs.openSync(filePath, 'a');
    return new FileActivityLog(fd, clock);
  }

  log(message: string): void {
    if (this.fd === null) {
      throw new Error('Activity log is closed');
    }
    fs.writeSync(this.fd, `[${formatTimestamp(this.clock.now())}] ${message}\n`);
  }

  close(): void {
    if (this.fd === null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }
}
