import { NestedType, Property } from '../mapping/annotations/decorators';

@NestedType()
export class Variant {
  @Property({ type: 'keyword' })
  sku!: string;

  @Property({ type: 'keyword', name: 'colour' })
  color!: string;

  @Property({ type: 'scaled_float', settings: { scaling_factor: 100 } })
  price!: number;
}
