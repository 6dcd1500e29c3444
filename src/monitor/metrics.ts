import type { Logger } from 'pino';

export interface MetricsRecorder {
  recordMetric(name: string, value: number, timestamp: Date): Promise<void>;
}

export class LogMetricsRecorder implements MetricsRecorder {
  constructor(private readonly logger: Logger) {}

  async recordMetric(name: string, value: number, timestamp: Date): Promise<void> {
    this.logger.info({ metric: name, value, timestamp: timestamp.toISOString() }, 'Metric recorded');
  }
}
