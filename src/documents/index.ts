import { Article } from './article.document';
import { Product } from './product.document';

export { Article } from './article.document';
export { BaseDocument } from './base.document';
export { Category } from './category.document';
export { Product } from './product.document';
export { Variant } from './variant.document';

export const DOCUMENTS = [Product, Article];
