import { Inject, Injectable, Logger } from '@nestjs/common';
import { AnalysisConfigResolver } from './analysis-config-resolver';
import { IndexAnnotation } from './annotations/annotations';
import { fetchStringTable } from './cache/field-name-tables';
import { MetadataCache } from './cache/metadata-cache.interface';
import {
  ANALYSIS_CONFIG,
  ANNOTATION_READER,
  DEFAULT_TYPE_NAME,
  INDEXES_CACHED,
  METADATA_CACHE,
} from './constants';
import { MappingConfigurationError } from './errors/mapping-configuration.error';
import { FieldMetadataExtractor } from './field-metadata-extractor';
import { AnalysisConfig, DocumentClass, IndexDefinition, MappingFragment } from './interfaces/mapping.interface';
import { AnnotationReader } from './readers/annotation-reader';
import { snake } from './utils/caser';
import { pruneEmpty } from './utils/prune';

/**
 * Compiles `@Index` document classes into index definitions
 * (`settings` + `mappings`) ready to be sent to the search engine.
 */
@Injectable()
export class SchemaCompilerService {
  private readonly logger = new Logger(SchemaCompilerService.name);

  constructor(
    @Inject(ANNOTATION_READER) private readonly reader: AnnotationReader,
    @Inject(METADATA_CACHE) private readonly cache: MetadataCache,
    @Inject(ANALYSIS_CONFIG) private readonly analysisConfig: AnalysisConfig,
    private readonly extractor: FieldMetadataExtractor,
    private readonly analysisResolver: AnalysisConfigResolver,
  ) {}

  getIndexAliasName(target: DocumentClass): string {
    return this.getIndexAnnotation(target)?.alias ?? snake(target.name);
  }

  isDefaultIndex(target: DocumentClass): boolean {
    return this.getIndexAnnotation(target)?.default ?? false;
  }

  getIndexAnnotation(target: DocumentClass): IndexAnnotation | undefined {
    return this.reader.getClassAnnotation(target, IndexAnnotation);
  }

  /**
   * @deprecated mapping types are removed from the search engine.
   */
  getTypeName(target: DocumentClass): string {
    return this.getIndexAnnotation(target)?.typeName ?? DEFAULT_TYPE_NAME;
  }

  getIndexMetadata(target: DocumentClass): IndexDefinition {
    const index = this.getIndexAnnotation(target);
    if (!index) {
      return {};
    }

    const settings = pruneEmpty({
      ...index.toSettings(),
      analysis: this.getAnalysisConfig(target),
    });
    const properties = pruneFragment(this.extractor.extract(target));

    const definition: IndexDefinition = {};
    if (Object.keys(settings).length > 0) {
      definition.settings = settings;
    }
    if (Object.keys(properties).length > 0) {
      definition.mappings = { [this.getTypeName(target)]: { properties } };
    }

    this.logger.debug(
      `Compiled ${target.name} into index '${this.getIndexAliasName(target)}' with ${
        Object.keys(properties).length
      } top-level field(s)`,
    );

    return definition;
  }

  getAnalysisConfig(target: DocumentClass): AnalysisConfig {
    return this.analysisResolver.resolveAnalysis(target, this.analysisConfig);
  }

  /**
   * Class name of the document registered under an index alias, or `null`
   * when no registration pass recorded it.
   */
  getDocumentNamespace(indexAlias: string): string | null {
    return fetchStringTable(this.cache, INDEXES_CACHED)[indexAlias] ?? null;
  }

  getParsedDocument(target: DocumentClass): IndexAnnotation {
    const index = this.getIndexAnnotation(target);
    if (!index) {
      throw new MappingConfigurationError(`${target.name} is not annotated with @Index`);
    }
    return index;
  }
}

function pruneFragment(fragment: MappingFragment): MappingFragment {
  const pruned: MappingFragment = {};
  for (const [field, mapping] of Object.entries(fragment)) {
    const fieldMapping = pruneEmpty(mapping);
    if (Object.keys(fieldMapping).length > 0) {
      pruned[field] = fieldMapping;
    }
  }
  return pruned;
}
