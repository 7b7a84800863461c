import { Controller, Get } from '@nestjs/common';

export const SUPPORTED_FORMATS = ['gpx', 'fit'] as const;

@Controller()
export class AppController {
  @Get()
  health() {
    return {
      status: 'ok',
      service: 'trackfuse',
      formats: SUPPORTED_FORMATS,
      timestamp: new Date().toISOString(),
    };
  }
}
