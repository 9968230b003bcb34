import { ActivityLog } from '../../services/activityLog';

// Keeps log lines in memory instead of a file
export class MemoryActivityLog implements ActivityLog {
  readonly lines: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }
}
