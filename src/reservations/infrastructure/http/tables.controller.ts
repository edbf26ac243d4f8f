import {
  Controller,
  Get,
  Post,
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
import { TableQueryService } from '../../application/services/table-query.service';
import { TableCommandService } from '../../application/services/table-command.service';
import {
  ListTablesQuerySchema,
  TableInputSchema,
} from '../../application/dto/table.dto';
import { IdSchema } from '../../application/dto/common.schemas';
import { LoggerService } from '../logging/logger.service';
import {
  getThrottleConfig,
  READ_LIMIT,
  WRITE_LIMIT,
} from '../rate-limiting/throttle-config';
import { handleRequest, parseInput } from './request-handler';

@ApiTags('tables')
@Controller('tables')
export class TablesController {
  constructor(
    private readonly tableQueryService: TableQueryService,
    private readonly tableCommandService: TableCommandService,
    private readonly logger: LoggerService,
  ) {}

  @Get()
  @Throttle(getThrottleConfig(READ_LIMIT))
  @ApiOperation({ summary: 'List tables' })
  @ApiResponse({ status: 200, description: 'Tables listed' })
  @ApiResponse({ status: 400, description: 'Invalid filters' })
  async listTables(@Query() query: unknown) {
    return handleRequest(this.logger, 'list_tables', {}, () =>
      this.tableQueryService.listTables(
        parseInput(ListTablesQuerySchema, query),
      ),
    );
  }

  @Get(':id')
  @Throttle(getThrottleConfig(READ_LIMIT))
  @ApiOperation({ summary: 'Get a table with its chairs' })
  @ApiResponse({ status: 200, description: 'Table found' })
  @ApiResponse({ status: 404, description: 'Table not found' })
  async getTable(@Param('id') id: string) {
    return handleRequest(this.logger, 'get_table', { tableId: id }, () =>
      this.tableQueryService.getTable(parseInput(IdSchema, id)),
    );
  }

  @Post()
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a table' })
  @ApiResponse({ status: 201, description: 'Table created' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  @ApiResponse({ status: 409, description: 'Table number already exists' })
  async createTable(@Body() body: unknown) {
    return handleRequest(this.logger, 'create_table', {}, () =>
      this.tableCommandService.createTable(parseInput(TableInputSchema, body)),
    );
  }

  @Put(':id')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @ApiOperation({ summary: 'Replace a table' })
  @ApiResponse({ status: 200, description: 'Table updated' })
  @ApiResponse({ status: 400, description: 'Invalid input' })
  @ApiResponse({ status: 404, description: 'Table not found' })
  @ApiResponse({ status: 409, description: 'Table number already exists' })
  async updateTable(@Param('id') id: string, @Body() body: unknown) {
    return handleRequest(this.logger, 'update_table', { tableId: id }, () =>
      this.tableCommandService.updateTable(
        parseInput(IdSchema, id),
        parseInput(TableInputSchema, body),
      ),
    );
  }

  @Delete(':id')
  @Throttle(getThrottleConfig(WRITE_LIMIT))
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a table' })
  @ApiResponse({ status: 204, description: 'Table deleted' })
  @ApiResponse({ status: 404, description: 'Table not found' })
  @ApiResponse({
    status: 409,
    description: 'Table is assigned to active reservations',
  })
  async deleteTable(@Param('id') id: string): Promise<void> {
    await handleRequest(this.logger, 'delete_table', { tableId: id }, () =>
      this.tableCommandService.deleteTable(parseInput(IdSchema, id)),
    );
  }
}
