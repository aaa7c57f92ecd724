import { Controller, Get, Query, Res, UseGuards } from '@nestjs/common';
import type { Response } from 'express';
import { z } from 'zod';
import { WEEKDAYS } from '../../common/time/ist-day';
import { AppTokenGuard } from '../auth/app-token.guard';
import { DailyContentService } from './daily-content.service';

/** `?day=` is case-insensitive; blank means "today" (preview) or "all" (history reset). */
export const weekdayQuerySchema = z.object({
  day: z
    .string()
    .optional()
    .transform((v) => v?.trim().toUpperCase() || undefined)
    .pipe(z.enum(WEEKDAYS).optional()),
});

@UseGuards(AppTokenGuard)
@Controller()
export class DailyContentController {
  constructor(private readonly daily: DailyContentService) {}

  @Get('daily')
  async today(@Res({ passthrough: true }) res: Response) {
    res.setHeader('Cache-Control', 'no-store');
    return await this.daily.getDaily();
  }

  @Get('preview')
  async preview(@Res({ passthrough: true }) res: Response, @Query() query: unknown) {
    res.setHeader('Cache-Control', 'no-store');
    const parsed = weekdayQuerySchema.parse(query ?? {});
    return await this.daily.preview(parsed.day ?? null);
  }

  @Get('reset-cache')
  async resetCache(@Res({ passthrough: true }) res: Response) {
    res.setHeader('Cache-Control', 'no-store');
    return await this.daily.resetCache();
  }

  @Get('reset-history')
  async resetHistory(@Res({ passthrough: true }) res: Response, @Query() query: unknown) {
    res.setHeader('Cache-Control', 'no-store');
    const parsed = weekdayQuerySchema.parse(query ?? {});
    return await this.daily.resetHistory(parsed.day ?? null);
  }
}
