import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BearerAuthGuard } from './auth';
import { DatabaseModule } from './database/database.module';
import { TransactionRunner } from './database/transaction-runner';
import { PayloadValidatorService } from './validation/payload-validator.service';

@Global()
@Module({
  imports: [ConfigModule, DatabaseModule],
  providers: [BearerAuthGuard, PayloadValidatorService, TransactionRunner],
  exports: [BearerAuthGuard, PayloadValidatorService, TransactionRunner],
})
export class CoreModule {}
