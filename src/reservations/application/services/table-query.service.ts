import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { TableRepository as ITableRepository } from '../../ports/repositories/table.repository.interface';
import { TABLE_REPOSITORY } from '../../tokens';
import {
  ListTablesQuery,
  TableDetailsResponse,
  TableResponse,
} from '../dto/table.dto';
import {
  toTableDetailsResponse,
  toTableResponse,
} from '../mappers/table.mapper';

@Injectable()
export class TableQueryService {
  constructor(
    @Inject(TABLE_REPOSITORY)
    private readonly tableRepository: ITableRepository,
  ) {}

  async listTables(query: ListTablesQuery): Promise<TableResponse[]> {
    const tables = await this.tableRepository.find(query);
    return tables.map(toTableResponse);
  }

  async getTable(id: string): Promise<TableDetailsResponse> {
    const table = await this.tableRepository.findById(id);
    if (!table) {
      throw new NotFoundException({
        error: 'not_found',
        detail: 'Table not found',
      });
    }

    const chairs = await this.tableRepository.findChairs(id);
    return toTableDetailsResponse(table, chairs);
  }
}
