import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { DocumentRegistryService } from '../src/mapping/document-registry.service';
import { SchemaCompilerService } from '../src/mapping/schema-compiler.service';

/**
 * Prints the compiled index definitions of every registered document.
 * Usage: ts-node scripts/dump-mappings.ts [alias]
 */
async function dumpMappings() {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });

  try {
    const registry = app.get(DocumentRegistryService);
    const compiler = app.get(SchemaCompilerService);
    const requested = process.argv[2];

    const definitions: Record<string, unknown> = {};
    for (const { alias } of registry.getDocuments()) {
      if (requested && requested !== alias) {
        continue;
      }
      const target = registry.getDocumentClass(alias);
      if (target) {
        definitions[alias] = compiler.getIndexMetadata(target);
      }
    }

    if (requested && !definitions[requested]) {
      console.error(`No document registered under '${requested}'`);
      process.exitCode = 1;
      return;
    }

    console.log(JSON.stringify(definitions, null, 2));
  } finally {
    await app.close();
  }
}

dumpMappings().catch(error => {
  console.error('Failed to dump mappings:', error instanceof Error ? error.message : error);
  process.exit(1);
});
