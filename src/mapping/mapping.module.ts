import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import mappingConfig from '../config/mapping.config';
import { loadAnalysisConfig } from '../config/analysis.loader';
import { AnalysisConfigResolver } from './analysis-config-resolver';
import { FileMetadataCache } from './cache/file-metadata-cache';
import { InMemoryMetadataCache } from './cache/in-memory-metadata-cache';
import { MetadataCache } from './cache/metadata-cache.interface';
import { ANALYSIS_CONFIG, ANNOTATION_READER, METADATA_CACHE } from './constants';
import { DocumentRegistryService } from './document-registry.service';
import { FieldMetadataExtractor } from './field-metadata-extractor';
import { FieldNameLookupService } from './field-name-lookup.service';
import { AnalysisConfig, DocumentClass } from './interfaces/mapping.interface';
import { PropertyCatalog } from './property-catalog';
import { ReflectAnnotationReader } from './readers/annotation-reader';
import { SchemaCompilerService } from './schema-compiler.service';

export interface MappingModuleOptions {
  /** Document classes registered on startup */
  documents?: DocumentClass[];
  /** Overrides the analysis configuration file */
  analysis?: AnalysisConfig;
  /** Overrides the cache chosen from configuration */
  cache?: MetadataCache;
  global?: boolean;
}

@Module({})
export class MappingModule {
  static register(options: MappingModuleOptions = {}): DynamicModule {
    return {
      module: MappingModule,
      global: options.global ?? false,
      imports: [ConfigModule.forFeature(mappingConfig)],
      providers: [
        { provide: ANNOTATION_READER, useClass: ReflectAnnotationReader },
        {
          provide: ANALYSIS_CONFIG,
          useFactory: (config: ConfigType<typeof mappingConfig>): AnalysisConfig =>
            options.analysis ?? loadAnalysisConfig(config.analysisPath),
          inject: [mappingConfig.KEY],
        },
        {
          provide: METADATA_CACHE,
          useFactory: (config: ConfigType<typeof mappingConfig>): MetadataCache => {
            if (options.cache) {
              return options.cache;
            }
            return config.cachePath
              ? new FileMetadataCache(config.cachePath)
              : new InMemoryMetadataCache();
          },
          inject: [mappingConfig.KEY],
        },
        PropertyCatalog,
        FieldMetadataExtractor,
        AnalysisConfigResolver,
        SchemaCompilerService,
        FieldNameLookupService,
        {
          provide: DocumentRegistryService,
          useFactory: (cache: MetadataCache, compiler: SchemaCompilerService) => {
            const registry = new DocumentRegistryService(cache, compiler);
            registry.register(...(options.documents ?? []));
            return registry;
          },
          inject: [METADATA_CACHE, SchemaCompilerService],
        },
      ],
      exports: [
        METADATA_CACHE,
        PropertyCatalog,
        FieldMetadataExtractor,
        SchemaCompilerService,
        FieldNameLookupService,
        DocumentRegistryService,
      ],
    };
  }
}
