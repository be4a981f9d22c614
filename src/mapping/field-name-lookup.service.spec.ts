import { Test, TestingModule } from '@nestjs/testing';
import { ShopProduct, User } from '../../test/fixtures/documents';
import { InMemoryMetadataCache } from './cache/in-memory-metadata-cache';
import { ANNOTATION_READER, METADATA_CACHE } from './constants';
import { FieldMetadataExtractor } from './field-metadata-extractor';
import { FieldNameLookupService } from './field-name-lookup.service';
import { PropertyCatalog } from './property-catalog';
import { ReflectAnnotationReader } from './readers/annotation-reader';

describe('FieldNameLookupService', () => {
  let lookup: FieldNameLookupService;
  let extractor: FieldMetadataExtractor;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FieldNameLookupService,
        FieldMetadataExtractor,
        PropertyCatalog,
        { provide: ANNOTATION_READER, useClass: ReflectAnnotationReader },
        { provide: METADATA_CACHE, useValue: new InMemoryMetadataCache() },
      ],
    }).compile();

    lookup = module.get<FieldNameLookupService>(FieldNameLookupService);
    extractor = module.get<FieldMetadataExtractor>(FieldMetadataExtractor);
  });

  it('should return null before any extraction', () => {
    expect(lookup.getSchemaFieldName('User', 'userName')).toBeNull();
  });

  it('should translate between object and schema field names', () => {
    extractor.extract(User);

    expect(lookup.getSchemaFieldName('User', 'userName')).toBe('user_name');
    expect(lookup.getObjectFieldName('User', 'years')).toBe('age');
    expect(lookup.getSchemaFieldName('Address', 'postalCode')).toBe('zip');
  });

  it('should resolve embedded classes', () => {
    extractor.extract(User);

    expect(lookup.getEmbeddedClassName('User', 'reviews')).toBe('Review');
    expect(lookup.getEmbeddedClassName('User', 'userName')).toBeNull();
  });

  it('should keep tables of different classes apart', () => {
    extractor.extract(User);
    extractor.extract(ShopProduct);

    expect(lookup.getSchemaFieldName('ShopProduct', 'internalCode')).toBe('internal_code');
    expect(lookup.getSchemaFieldName('User', 'internalCode')).toBeNull();
    expect(lookup.getSchemaFieldName('ShopProduct', 'userName')).toBeNull();
  });
});
