import { Controller, Get, Logger, NotFoundException, Param } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DocumentRegistryService, RegisteredDocument } from '../../mapping/document-registry.service';
import { FieldMetadataExtractor } from '../../mapping/field-metadata-extractor';
import { DocumentClass, FieldNameTables, IndexDefinition } from '../../mapping/interfaces/mapping.interface';
import { SchemaCompilerService } from '../../mapping/schema-compiler.service';

@ApiTags('Mappings')
@Controller('api/mappings')
export class MappingController {
  private readonly logger = new Logger(MappingController.name);

  constructor(
    private readonly registry: DocumentRegistryService,
    private readonly compiler: SchemaCompilerService,
    private readonly extractor: FieldMetadataExtractor,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List registered documents and their index aliases' })
  listIndices(): { indices: RegisteredDocument[] } {
    return { indices: this.registry.getDocuments() };
  }

  @Get(':alias')
  @ApiOperation({
    summary: 'Compiled index definition',
    description: 'Index settings, used analysis components and field mappings of a document.',
  })
  @ApiParam({ name: 'alias', description: 'Index alias', example: 'products' })
  @ApiResponse({ status: 404, description: 'No document is registered under the alias' })
  getIndexDefinition(@Param('alias') alias: string): IndexDefinition {
    const definition = this.compiler.getIndexMetadata(this.findDocument(alias));
    this.logger.log(`Compiled index definition for '${alias}'`);
    return definition;
  }

  @Get(':alias/fields')
  @ApiOperation({ summary: 'Object <-> schema field name tables of a document' })
  @ApiParam({ name: 'alias', description: 'Index alias', example: 'products' })
  @ApiResponse({ status: 404, description: 'No document is registered under the alias' })
  getFieldNames(@Param('alias') alias: string): FieldNameTables {
    const target = this.findDocument(alias);
    this.extractor.extract(target);
    return this.extractor.getFieldNameTables(target);
  }

  private findDocument(alias: string): DocumentClass {
    const target = this.registry.getDocumentClass(alias);
    if (!target) {
      throw new NotFoundException(`Index ${alias} not found`);
    }
    return target;
  }
}
