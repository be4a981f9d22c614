import { Embedded, Index, Property } from '../mapping/annotations/decorators';
import { BaseDocument } from './base.document';
import { Category } from './category.document';

@Index({ settings: { refresh_interval: '5s' } })
export class Article extends BaseDocument {
  @Property({ type: 'text', analyzer: 'english_text' })
  headline!: string;

  @Property({ type: 'text', name: 'body', analyzer: 'html_text' })
  content!: string;

  @Embedded(() => Category, { name: 'categories' })
  tags!: Category[];
}
