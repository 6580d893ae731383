import { Controller, Get } from '@nestjs/common';

@Controller('health')
export class HealthController {
  @Get()
  status() {
    return {
      status: 'ok',
      service: 'approval-ledger-backend',
      time: new Date().toISOString(),
    };
  }
}
