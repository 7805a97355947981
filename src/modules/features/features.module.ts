import { Module } from '@nestjs/common';
import { CoreModule } from '../../core/core.module';
import { BillingModule } from '../billing/billing.module';
import { FeaturesController } from './features.controller';
import { FeaturesService } from './features.service';

@Module({
  imports: [CoreModule, BillingModule],
  controllers: [FeaturesController],
  providers: [FeaturesService],
})
export class FeaturesModule {}
