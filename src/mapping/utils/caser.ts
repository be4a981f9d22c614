import { snakeCase } from 'lodash';

/** `userName` -> `user_name`, `ShopProduct` -> `shop_product` */
export function snake(value: string): string {
  return snakeCase(value);
}
