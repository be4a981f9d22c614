import { ObjectType, Property } from '../mapping/annotations/decorators';

@ObjectType()
export class Category {
  @Property({ type: 'keyword' })
  slug!: string;

  @Property({ type: 'text', analyzer: 'english_text' })
  title!: string;
}
