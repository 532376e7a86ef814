import * as fs from 'fs';
import * as path from 'path';
import { LoadConfiguration, RunOptions } from '../config/types';
import { Summary } from '../metrics/types';

export const OUTPUT_FORMAT_VERSION = '1.0.0';

export class JSONOutput {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async write(summary: Summary, config: LoadConfiguration, run: RunOptions): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.promises.mkdir(dir, { recursive: true });

    const output = {
      metadata: {
        version: OUTPUT_FORMAT_VERSION,
        generated_at: new Date().toISOString()
      },
      configuration: {
        ...config,
        concurrency: run.concurrency,
        requests: run.requests
      },
      summary
    };

    await fs.promises.writeFile(this.filePath, JSON.stringify(output, null, 2));
  }
}
