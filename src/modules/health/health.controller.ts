import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import { APP_VERSION } from '../../common/app-version';
import type { HealthDto } from '../../common/dto/daily.dto';
import { ProviderGatewayService } from '../providers/provider-gateway.service';

@Controller('health')
export class HealthController {
  constructor(private readonly gateway: ProviderGatewayService) {}

  @Get()
  health(@Res({ passthrough: true }) httpRes: Response): HealthDto {
    httpRes.setHeader('Cache-Control', 'no-store');
    const uptimeSeconds = Math.max(0, Math.floor(process.uptime()));
    // Configuration only; no upstream calls, so a provider outage never fails the probe.
    return { ok: true, version: APP_VERSION, uptimeSeconds, providers: this.gateway.configured() };
  }
}
