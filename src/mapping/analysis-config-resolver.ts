import { Injectable } from '@nestjs/common';
import { cloneDeep } from 'lodash';
import { ANALYZER_KEYS, AUXILIARY_ANALYSIS_KEYS } from './constants';
import { FieldMetadataExtractor } from './field-metadata-extractor';
import {
  AnalysisComponent,
  AnalysisConfig,
  AnalysisSection,
  DocumentClass,
} from './interfaces/mapping.interface';
import { isRecord } from './utils/prune';

/**
 * Collects every value found under `searchKey` at any depth. Strings count as
 * one name; arrays and objects under the key contribute their string members.
 */
export function collectValuesByKey(searchKey: string, tree: unknown): string[] {
  const found = new Set<string>();

  const visit = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!isRecord(node)) {
      return;
    }

    for (const [key, value] of Object.entries(node)) {
      if (key === searchKey) {
        if (typeof value === 'string') {
          found.add(value);
        } else if (Array.isArray(value) || isRecord(value)) {
          Object.values(value)
            .filter((item): item is string => typeof item === 'string')
            .forEach(item => found.add(item));
        }
      }
      visit(value);
    }
  };

  visit(tree);
  return Array.from(found);
}

/**
 * Narrows the global analysis configuration down to the components a document
 * mapping actually uses.
 *
 * Analyzers are picked from the mapping. Tokenizers, filters, normalizers and
 * char filters are then picked from the configuration built so far, one kind
 * after another, so a component only referenced by another auxiliary
 * component of a later kind is not followed further.
 */
@Injectable()
export class AnalysisConfigResolver {
  constructor(private readonly extractor: FieldMetadataExtractor) {}

  resolveAnalysis(target: DocumentClass, globalConfig: AnalysisConfig): AnalysisConfig {
    const config: AnalysisConfig = {};
    const mapping = this.extractor.extract(target);

    const analyzers = new Set(ANALYZER_KEYS.flatMap(key => collectValuesByKey(key, mapping)));
    this.copyComponents(config, globalConfig, 'analyzer', analyzers);

    for (const section of AUXILIARY_ANALYSIS_KEYS) {
      this.copyComponents(config, globalConfig, section, collectValuesByKey(section, config));
    }

    return config;
  }

  private copyComponents(
    config: AnalysisConfig,
    globalConfig: AnalysisConfig,
    section: AnalysisSection,
    names: Iterable<string>,
  ): void {
    const available = globalConfig[section] ?? {};

    for (const name of names) {
      if (!Object.prototype.hasOwnProperty.call(available, name)) {
        continue;
      }
      const components: Record<string, AnalysisComponent> = config[section] ?? {};
      components[name] = cloneDeep(available[name]);
      config[section] = components;
    }
  }
}
