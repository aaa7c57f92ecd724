import { Controller, Get } from '@nestjs/common';
import { APP_VERSION } from '../../common/app-version';
import type { VersionDto } from '../../common/dto/daily.dto';
import { resolveIstDay } from '../../common/time/ist-day';
import { RESPONSE_SCHEMA_DESCRIPTION } from './response-schema';

@Controller()
export class MetaController {
  @Get()
  root() {
    return { ok: true, service: 'daily-drop-api', version: APP_VERSION };
  }

  @Get('version')
  version(): VersionDto {
    const day = resolveIstDay(new Date());
    return { ok: true, version: APP_VERSION, date_ist: day.dateIst, weekday: day.weekday };
  }

  @Get('schema')
  schema() {
    return RESPONSE_SCHEMA_DESCRIPTION;
  }
}
