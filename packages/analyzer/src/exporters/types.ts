import type { ReportKind } from '@ytpulse/shared';
import type { AggregatedDataset } from '../dataset.js';

export interface ExportContext {
  /** Run timestamp used in file names, yyyyMMdd_HHmmss */
  timestamp: string;
  generatedAt: Date;
  outputDir: string;
}

/** How an artifact is described in the generated README */
export interface ReadmeEntry {
  format: string;
  description: string;
  details: string[];
}

export interface ReportExporter {
  readonly kind: ReportKind;
  readonly label: string;
  readonly readme: ReadmeEntry;
  fileName(timestamp: string): string;
  export(dataset: AggregatedDataset, filePath: string, context: ExportContext): Promise<void>;
}
