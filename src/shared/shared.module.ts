import { Module } from '@nestjs/common';
import { StorageModule } from './storage/storage.module';
import { HttpModule } from './http/http.module';
import { LoggingModule } from './logging/logging.module';

@Module({
  imports: [StorageModule, HttpModule, LoggingModule],
  exports: [StorageModule, HttpModule, LoggingModule],
})
export class SharedModule {}
