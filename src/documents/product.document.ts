import { Embedded, Index, Property } from '../mapping/annotations/decorators';
import { BaseDocument } from './base.document';
import { Category } from './category.document';
import { Variant } from './variant.document';

@Index({ alias: 'products', default: true, numberOfShards: 1, numberOfReplicas: 0 })
export class Product extends BaseDocument {
  @Property({
    type: 'text',
    analyzer: 'english_text',
    fields: { suggest: { type: 'text', analyzer: 'autocomplete' } },
  })
  title!: string;

  @Property({ type: 'text', analyzer: 'html_text', searchAnalyzer: 'english_text' })
  description!: string;

  @Property({ type: 'boolean', settings: { index: false } })
  inStock!: boolean;

  @Embedded(() => Category)
  category!: Category;

  @Embedded(() => Variant)
  variants!: Variant[];
}
