import {
  Controller,
  Get,
  Put,
  Delete,
  Query,
  Body,
  Param,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { HoursService } from '../../application/services/hours.service';
import {
  ListSpecialHoursQuerySchema,
  SetOperatingHoursSchema,
  SetSpecialHoursSchema,
} from '../../application/dto/hours.dto';
import {
  CalendarDateSchema,
  IdSchema,
} from '../../application/dto/common.schemas';
import { LoggerService } from '../logging/logger.service';
import {
  getThrottleConfig,
  READ_LIMIT,
  WRITE_LIMIT,
} from '../rate-limiting/throttle-config';
import { handleRequest, parseInput } from './request-handler';

@ApiTags('hours')
@Controller()
export class HoursController {
  constructor(
    private readonly hoursService: HoursService,
    private readonly logger: LoggerService,
  ) {}

  @Get('hours')
  @Throttle(getThrottleConfig(READ_LIMIT))
  @ApiOperation({ summary: 'Weekly operating hours' })
  @ApiResponse({ status: 200, description: 'Weekly schedule' })
  async getWeeklyHours() {
    return handleRequest(this.logger, 'get_weekly_hours', {}, () =>
      this.hoursService.getWeeklyHours(),
    );
  }

  @Put('hours')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @ApiOperation({ summary: 'Set the hours of one weekday' })
  @ApiResponse({ status: 200, description: 'Hours saved' })
  @ApiResponse({ status: 400, description: 'Invalid hours' })
  async setWeeklyHours(@Body() body: unknown) {
    return handleRequest(this.logger, 'set_weekly_hours', {}, () =>
      this.hoursService.setWeeklyHours(
        parseInput(SetOperatingHoursSchema, body),
      ),
    );
  }

  @Get('hours/:date/effective')
  @Throttle(getThrottleConfig(READ_LIMIT))
  @ApiOperation({ summary: 'Hours that govern a date' })
  @ApiResponse({ status: 200, description: 'Effective hours resolved' })
  @ApiResponse({ status: 400, description: 'Invalid date' })
  async getEffectiveHours(@Param('date') date: string) {
    return handleRequest(this.logger, 'resolve_hours', { date }, () =>
      this.hoursService.getEffectiveHours(parseInput(CalendarDateSchema, date)),
    );
  }

  @Get('special-hours')
  @Throttle(getThrottleConfig(READ_LIMIT))
  @ApiOperation({ summary: 'List special hours' })
  @ApiResponse({ status: 200, description: 'Special hours listed' })
  async listSpecialHours(@Query() query: unknown) {
    return handleRequest(this.logger, 'list_special_hours', {}, () =>
      this.hoursService.listSpecialHours(
        parseInput(ListSpecialHoursQuerySchema, query),
      ),
    );
  }

  @Get('special-hours/:date')
  @Throttle(getThrottleConfig(READ_LIMIT))
  @ApiOperation({ summary: 'Special hours of a date' })
  @ApiResponse({ status: 200, description: 'Special hours found' })
  @ApiResponse({ status: 404, description: 'No special hours for the date' })
  async getSpecialHours(@Param('date') date: string) {
    return handleRequest(this.logger, 'get_special_hours', { date }, () =>
      this.hoursService.getSpecialHours(parseInput(CalendarDateSchema, date)),
    );
  }

  @Put('special-hours')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @ApiOperation({ summary: 'Create or replace the special hours of a date' })
  @ApiResponse({ status: 200, description: 'Special hours saved' })
  @ApiResponse({ status: 400, description: 'Invalid hours' })
  async setSpecialHours(@Body() body: unknown) {
    return handleRequest(this.logger, 'set_special_hours', {}, () =>
      this.hoursService.setSpecialHours(
        parseInput(SetSpecialHoursSchema, body),
      ),
    );
  }

  @Delete('special-hours/:id')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete special hours' })
  @ApiResponse({ status: 204, description: 'Special hours deleted' })
  @ApiResponse({ status: 404, description: 'Special hours not found' })
  async deleteSpecialHours(@Param('id') id: string): Promise<void> {
    await handleRequest(this.logger, 'delete_special_hours', { id }, () =>
      this.hoursService.deleteSpecialHours(parseInput(IdSchema, id)),
    );
  }
}
