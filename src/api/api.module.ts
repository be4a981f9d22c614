import { Module } from '@nestjs/common';
import { MappingController } from './controllers/mapping.controller';

@Module({
  controllers: [MappingController],
})
export class ApiModule {}
