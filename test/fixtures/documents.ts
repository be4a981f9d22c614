import {
  Embedded,
  Id,
  Index,
  NestedType,
  ObjectType,
  Property,
} from '../../src/mapping/annotations/decorators';
import { AnalysisConfig } from '../../src/mapping/interfaces/mapping.interface';

@ObjectType()
export class Address {
  @Property({ type: 'keyword' })
  city!: string;

  @Property({ type: 'keyword', name: 'zip' })
  postalCode!: string;
}

@NestedType()
export class Review {
  @Property({ type: 'text', analyzer: 'std' })
  message!: string;

  @Property({ type: 'keyword' })
  authorName!: string;
}

export abstract class Timestamped {
  @Property({ type: 'date' })
  createdAt!: Date;

  @Property({ type: 'keyword' })
  status!: string;
}

@Index({
  alias: 'users',
  default: true,
  typeName: 'user',
  numberOfShards: 2,
  settings: { refresh_interval: '1s' },
})
export class User extends Timestamped {
  @Id()
  id!: string;

  @Property({ type: 'text', analyzer: 'std', searchAnalyzer: 'custom_search' })
  userName!: string;

  @Property({ type: 'integer', name: 'years' })
  age!: number;

  @Property({ type: 'text', analyzer: 'std' })
  status!: string;

  @Embedded(() => Address)
  address!: Address;

  @Embedded(() => Review)
  reviews!: Review[];
}

@Index()
export class ShopProduct {
  @Property({ type: 'keyword' })
  sku!: string;

  @Property({ type: 'keyword', settings: { index: false, doc_values: '' } })
  internalCode!: string;
}

@Index()
export class Note {
  @Property({ type: 'text', analyzer: 'chained' })
  body!: string;
}

@Index()
export class Glossary {
  @Property({ type: 'text', analyzer: 'layered' })
  term!: string;
}

@Index()
export class EmptyDocument {}

export class PlainEntity {
  @Property({ type: 'keyword' })
  name!: string;
}

export class Unmarked {
  @Property({ type: 'keyword' })
  value!: string;
}

@ObjectType()
@NestedType()
export class DoubleMarked {
  @Property({ type: 'keyword' })
  value!: string;
}

@Index()
export class WithUnmarked {
  @Embedded(() => Unmarked)
  broken!: Unmarked;
}

@Index()
export class WithDoubleMarked {
  @Embedded(() => DoubleMarked)
  ambiguous!: DoubleMarked;
}

@ObjectType()
export class TreeNode {
  @Property({ type: 'keyword' })
  label!: string;

  @Embedded(() => TreeNode)
  children!: TreeNode[];
}

@ObjectType()
export class Left {
  @Embedded(() => Right)
  right!: Right[];
}

@ObjectType()
export class Right {
  @Embedded(() => Left)
  left!: Left[];
}

@Index()
export class WithCircular {
  @Embedded(() => Left)
  left!: Left[];
}

@ObjectType()
export class Shared {
  @Property({ type: 'keyword' })
  code!: string;
}

@Index()
export class TwoShared {
  @Embedded(() => Shared)
  first!: Shared;

  @Embedded(() => Shared)
  second!: Shared;
}

export const ANALYSIS: AnalysisConfig = {
  analyzer: {
    std: { type: 'custom', tokenizer: 'standard', filter: ['lowercase'] },
    custom_search: {
      type: 'custom',
      tokenizer: 'edge',
      filter: ['ascii'],
      char_filter: ['strip'],
    },
    custom1: { type: 'custom', tokenizer: 'whitespace' },
    chained: { type: 'custom', tokenizer: 'standard', filter: ['synonyms'] },
    layered: { type: 'custom', tokenizer: 'keyword_tokenizer', filter: ['folding'] },
  },
  tokenizer: {
    edge: { type: 'edge_ngram', min_gram: 2 },
    whitespace: { type: 'whitespace' },
    deep_tokenizer: { type: 'pattern', pattern: '\\W+' },
    keyword_tokenizer: { type: 'keyword', normalizer: 'lower' },
  },
  filter: {
    ascii: { type: 'asciifolding' },
    synonyms: { type: 'synonym_graph', tokenizer: 'deep_tokenizer' },
    folding: { type: 'asciifolding', char_filter: ['ampersand'] },
  },
  normalizer: {
    lower: { type: 'custom', filter: ['ascii'], char_filter: ['underscores'] },
  },
  char_filter: {
    strip: { type: 'html_strip' },
    ampersand: { type: 'mapping', mappings: ['& => and'] },
    underscores: { type: 'mapping', mappings: ['_ => -'] },
    unused_char_filter: { type: 'html_strip' },
  },
};
