import { Test, TestingModule } from '@nestjs/testing';
import { ANALYSIS, Glossary, Note, Review, ShopProduct, User } from '../../test/fixtures/documents';
import { AnalysisConfigResolver, collectValuesByKey } from './analysis-config-resolver';
import { InMemoryMetadataCache } from './cache/in-memory-metadata-cache';
import { ANNOTATION_READER, METADATA_CACHE } from './constants';
import { FieldMetadataExtractor } from './field-metadata-extractor';
import { PropertyCatalog } from './property-catalog';
import { ReflectAnnotationReader } from './readers/annotation-reader';

describe('collectValuesByKey', () => {
  it('should collect string values at any depth without duplicates', () => {
    const mapping = {
      title: {
        type: 'text',
        analyzer: 'english',
        fields: { suggest: { type: 'text', analyzer: 'autocomplete' } },
      },
      body: { type: 'text', analyzer: 'english' },
    };

    expect(collectValuesByKey('analyzer', mapping)).toEqual(['english', 'autocomplete']);
  });

  it('should flatten array values', () => {
    const config = {
      analyzer: {
        a: { filter: ['lowercase', 'stop'] },
        b: { filter: 'stop' },
      },
    };

    expect(collectValuesByKey('filter', config)).toEqual(['lowercase', 'stop']);
  });

  it('should return nothing when the key is absent', () => {
    expect(collectValuesByKey('tokenizer', { a: { type: 'keyword' } })).toEqual([]);
  });
});

describe('AnalysisConfigResolver', () => {
  let resolver: AnalysisConfigResolver;
  let extractor: FieldMetadataExtractor;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnalysisConfigResolver,
        FieldMetadataExtractor,
        PropertyCatalog,
        { provide: ANNOTATION_READER, useClass: ReflectAnnotationReader },
        { provide: METADATA_CACHE, useValue: new InMemoryMetadataCache() },
      ],
    }).compile();

    resolver = module.get<AnalysisConfigResolver>(AnalysisConfigResolver);
    extractor = module.get<FieldMetadataExtractor>(FieldMetadataExtractor);
  });

  it('should only keep analyzers referenced by the mapping', () => {
    const globalConfig = {
      analyzer: {
        std: { type: 'standard' },
        custom1: { type: 'custom', tokenizer: 'whitespace' },
      },
    };

    expect(resolver.resolveAnalysis(Review, globalConfig)).toEqual({
      analyzer: { std: { type: 'standard' } },
    });
  });

  it('should pull in the components used by the selected analyzers', () => {
    expect(resolver.resolveAnalysis(User, ANALYSIS)).toEqual({
      analyzer: {
        std: ANALYSIS.analyzer?.std,
        custom_search: ANALYSIS.analyzer?.custom_search,
      },
      tokenizer: { edge: { type: 'edge_ngram', min_gram: 2 } },
      filter: { ascii: { type: 'asciifolding' } },
      char_filter: { strip: { type: 'html_strip' } },
    });
  });

  it('should not follow references made by auxiliary components to earlier kinds', () => {
    const analysis = resolver.resolveAnalysis(Note, ANALYSIS);

    expect(analysis).toEqual({
      analyzer: { chained: ANALYSIS.analyzer?.chained },
      filter: { synonyms: { type: 'synonym_graph', tokenizer: 'deep_tokenizer' } },
    });
    expect(analysis.tokenizer).toBeUndefined();
  });

  it('should follow references made by auxiliary components to later kinds', () => {
    expect(resolver.resolveAnalysis(Glossary, ANALYSIS)).toEqual({
      analyzer: {
        layered: { type: 'custom', tokenizer: 'keyword_tokenizer', filter: ['folding'] },
      },
      tokenizer: { keyword_tokenizer: { type: 'keyword', normalizer: 'lower' } },
      filter: { folding: { type: 'asciifolding', char_filter: ['ampersand'] } },
      normalizer: {
        lower: { type: 'custom', filter: ['ascii'], char_filter: ['underscores'] },
      },
      char_filter: {
        ampersand: { type: 'mapping', mappings: ['& => and'] },
        underscores: { type: 'mapping', mappings: ['_ => -'] },
      },
    });
  });

  it('should copy components instead of sharing them with the global configuration', () => {
    const first = resolver.resolveAnalysis(User, ANALYSIS);
    const filters = first.analyzer?.std.filter;
    expect(Array.isArray(filters)).toBe(true);
    if (Array.isArray(filters)) {
      filters.push('injected');
    }

    expect(ANALYSIS.analyzer?.std).toEqual({
      type: 'custom',
      tokenizer: 'standard',
      filter: ['lowercase'],
    });
    expect(resolver.resolveAnalysis(User, ANALYSIS).analyzer?.std.filter).toEqual(['lowercase']);
  });

  it('should return an empty configuration when no analyzer is referenced', () => {
    expect(resolver.resolveAnalysis(ShopProduct, ANALYSIS)).toEqual({});
  });

  it('should ignore analyzers missing from the global configuration', () => {
    expect(resolver.resolveAnalysis(User, {})).toEqual({});
  });

  it('should run its own extraction pass', () => {
    const spy = jest.spyOn(extractor, 'extract');

    resolver.resolveAnalysis(User, ANALYSIS);

    expect(spy).toHaveBeenCalledWith(User);
  });
});
