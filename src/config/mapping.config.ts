import { registerAs } from '@nestjs/config';
import * as path from 'path';

export default registerAs('mapping', () => ({
  // Global analysis components (analyzers, tokenizers, filters, ...) documents can reference
  analysisPath:
    process.env.MAPPING_ANALYSIS_PATH || path.join(process.cwd(), 'config', 'analysis.json'),

  // JSON file the field name tables are persisted to; memory only when unset
  cachePath: process.env.MAPPING_CACHE_PATH || undefined,
}));
