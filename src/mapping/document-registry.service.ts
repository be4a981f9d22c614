import { Inject, Injectable, Logger } from '@nestjs/common';
import { MetadataCache } from './cache/metadata-cache.interface';
import { INDEXES_CACHED, METADATA_CACHE } from './constants';
import { MappingConfigurationError } from './errors/mapping-configuration.error';
import { DocumentClass } from './interfaces/mapping.interface';
import { SchemaCompilerService } from './schema-compiler.service';

export interface RegisteredDocument {
  alias: string;
  document: string;
  default: boolean;
}

/**
 * Keeps track of the document classes the application maps and publishes the
 * alias -> class name registry other processes resolve documents with.
 */
@Injectable()
export class DocumentRegistryService {
  private readonly logger = new Logger(DocumentRegistryService.name);
  private documents = new Map<string, DocumentClass>();

  constructor(
    @Inject(METADATA_CACHE) private readonly cache: MetadataCache,
    private readonly compiler: SchemaCompilerService,
  ) {}

  /**
   * Registers a batch of documents. The batch is checked as a whole against
   * what is already registered; a rejected batch leaves the registry as it was.
   */
  register(...targets: DocumentClass[]): void {
    const staged = new Map(this.documents);

    for (const target of targets) {
      this.compiler.getParsedDocument(target);

      const alias = this.compiler.getIndexAliasName(target);
      const existing = staged.get(alias);
      if (existing && existing !== target) {
        throw new MappingConfigurationError(
          `Index alias '${alias}' is used by both ${existing.name} and ${target.name}`,
        );
      }
      staged.set(alias, target);
    }

    this.assertUniqueClassNames(staged);
    this.resolveDefaultIndex(staged);

    this.documents = staged;
    this.publish();
    for (const target of targets) {
      this.logger.log(
        `Registered document ${target.name} as index '${this.compiler.getIndexAliasName(target)}'`,
      );
    }
  }

  getDocuments(): RegisteredDocument[] {
    const defaultAlias = this.getDefaultIndex();
    return Array.from(this.documents.entries()).map(([alias, target]) => ({
      alias,
      document: target.name,
      default: alias === defaultAlias,
    }));
  }

  getDocumentClass(alias: string): DocumentClass | undefined {
    return this.documents.get(alias);
  }

  /**
   * Alias of the default index. A lone document is the default even when it
   * does not say so.
   */
  getDefaultIndex(): string | null {
    return this.resolveDefaultIndex(this.documents);
  }

  // Cached tables are keyed by class name.
  private assertUniqueClassNames(documents: Map<string, DocumentClass>): void {
    const byName = new Map<string, DocumentClass>();
    for (const target of documents.values()) {
      const other = byName.get(target.name);
      if (other && other !== target) {
        throw new MappingConfigurationError(
          `Two different document classes are named ${target.name}`,
        );
      }
      byName.set(target.name, target);
    }
  }

  private resolveDefaultIndex(documents: Map<string, DocumentClass>): string | null {
    const defaults = Array.from(documents.entries()).filter(([, target]) =>
      this.compiler.isDefaultIndex(target),
    );

    if (defaults.length > 1) {
      throw new MappingConfigurationError(
        `Only one index can be default, found: ${defaults.map(([alias]) => alias).join(', ')}`,
      );
    }
    if (defaults.length === 1) {
      return defaults[0][0];
    }
    if (documents.size === 1) {
      return Array.from(documents.keys())[0];
    }
    return null;
  }

  private publish(): void {
    const indexes: Record<string, string> = {};
    for (const [alias, target] of this.documents) {
      indexes[alias] = target.name;
    }
    this.cache.save(INDEXES_CACHED, indexes);
  }
}
