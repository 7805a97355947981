import { Controller, Get } from '@nestjs/common';

const SERVICE_BANNER = 'Tenant Billing API';

@Controller()
export class AppController {
  @Get()
  getBanner(): { message: string } {
    return { message: SERVICE_BANNER };
  }
}
