import { Id, Property } from '../mapping/annotations/decorators';

export abstract class BaseDocument {
  @Id()
  id!: string;

  @Property({ type: 'date', settings: { format: 'strict_date_optional_time' } })
  createdAt!: Date;
}
