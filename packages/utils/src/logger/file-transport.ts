import * as fs from 'fs';
import * as path from 'path';

export interface FileTransportConfig {
  /** Base directory for logs */
  logDir: string;
  /** Service name used as the file prefix */
  service: string;
  /** Also write ERROR and FATAL entries to {service}-{date}.error.log */
  separateErrorLog: boolean;
}

type StreamKind = 'main' | 'error' | 'perf';

function dateStamp(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Appends JSON log lines to daily files: {service}-{YYYY-MM-DD}[.error|.perf].log
 */
export class FileTransport {
  private readonly config: FileTransportConfig;
  private readonly streams = new Map<StreamKind, fs.WriteStream>();
  private currentDate = dateStamp();

  constructor(config: FileTransportConfig) {
    this.config = config;
    fs.mkdirSync(config.logDir, { recursive: true });
  }

  write(entry: Record<string, unknown>): void {
    this.append('main', entry);

    const level = entry.level;
    if (this.config.separateErrorLog && (level === 'ERROR' || level === 'FATAL')) {
      this.append('error', entry);
    }
  }

  writePerf(entry: Record<string, unknown>): void {
    this.append('perf', entry);
  }

  closeStreams(): void {
    for (const stream of this.streams.values()) {
      stream.end();
    }
    this.streams.clear();
  }

  /**
   * Resolve once every open stream has handed its buffer to the OS
   */
  async flush(): Promise<void> {
    const pending = [...this.streams.values()].filter((stream) => stream.writableLength > 0);
    await Promise.all(
      pending.map((stream) => new Promise<void>((resolve) => stream.once('drain', () => resolve())))
    );
  }

  private append(kind: StreamKind, entry: Record<string, unknown>): void {
    this.stream(kind).write(JSON.stringify(entry) + '\n');
  }

  private stream(kind: StreamKind): fs.WriteStream {
    const today = dateStamp();
    if (today !== this.currentDate) {
      this.closeStreams();
      this.currentDate = today;
    }

    const existing = this.streams.get(kind);
    if (existing) return existing;

    const suffix = kind === 'main' ? '.log' : `.${kind}.log`;
    const filePath = path.join(this.config.logDir, `${this.config.service}-${today}${suffix}`);
    const created = fs.createWriteStream(filePath, { flags: 'a' });
    this.streams.set(kind, created);
    return created;
  }
}
