import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheck,
  HealthCheckService,
  MemoryHealthIndicator,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import { HealthService } from './health.service';

@Controller('health')
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private memory: MemoryHealthIndicator,
    private database: TypeOrmHealthIndicator,
    private healthService: HealthService,
    private configService: ConfigService,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    const heapLimitMb = Number(
      this.configService.get<string>('HEALTH_HEAP_LIMIT_MB', '512'),
    );

    return this.health.check([
      () => this.database.pingCheck('database'),
      () => this.memory.checkHeap('memory_heap', heapLimitMb * 1024 * 1024),
      () => this.healthService.checkLedger(),
    ]);
  }
}
