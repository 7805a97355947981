import { Module } from '@nestjs/common';
import { CoreModule } from '../../core/core.module';
import { BillingModule } from '../billing/billing.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';

@Module({
  imports: [CoreModule, BillingModule],
  controllers: [AuthController],
  providers: [AuthService],
})
export class AuthModule {}
