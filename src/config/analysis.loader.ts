import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import { AnalysisComponent, AnalysisConfig, AnalysisSection } from '../mapping/interfaces/mapping.interface';
import { isRecord } from '../mapping/utils/prune';

const logger = new Logger('AnalysisConfigLoader');

const SECTIONS: AnalysisSection[] = ['analyzer', 'tokenizer', 'filter', 'normalizer', 'char_filter'];

/**
 * Validates a parsed analysis document: every section must map component
 * names to settings objects. Unknown sections are rejected.
 */
export function parseAnalysisConfig(raw: unknown): AnalysisConfig {
  if (!isRecord(raw)) {
    throw new Error('Analysis configuration must be a JSON object');
  }

  const config: AnalysisConfig = {};
  for (const [section, components] of Object.entries(raw)) {
    const known = SECTIONS.find(name => name === section);
    if (!known) {
      throw new Error(`Unknown analysis section '${section}'`);
    }
    if (!isRecord(components)) {
      throw new Error(`Analysis section '${section}' must be an object`);
    }

    const parsed: Record<string, AnalysisComponent> = {};
    for (const [name, settings] of Object.entries(components)) {
      if (!isRecord(settings)) {
        throw new Error(`Analysis component '${section}.${name}' must be an object`);
      }
      parsed[name] = settings;
    }
    config[known] = parsed;
  }

  return config;
}

export function loadAnalysisConfig(filePath: string): AnalysisConfig {
  if (!fs.existsSync(filePath)) {
    logger.warn(`No analysis configuration at ${filePath}, using an empty one`);
    return {};
  }

  const config = parseAnalysisConfig(JSON.parse(fs.readFileSync(filePath, 'utf8')));
  logger.log(
    `Loaded analysis configuration from ${filePath}: ${Object.keys(config.analyzer ?? {}).length} analyzer(s)`,
  );
  return config;
}
