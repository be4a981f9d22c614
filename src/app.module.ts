import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ApiModule } from './api/api.module';
import { validateEnvironment } from './config/env.validation';
import { DOCUMENTS } from './documents';
import { MappingModule } from './mapping/mapping.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    MappingModule.register({ documents: DOCUMENTS, global: true }),
    ApiModule,
  ],
})
export class AppModule {}
