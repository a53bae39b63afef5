import { Controller, Get, HttpCode, Post } from '@nestjs/common';
import { DataLoaderService, summarizeSnapshot } from './data-loader.service';
import { SnapshotSummary } from './dto/dashboard-snapshot.dto';

/**
 * SnapshotController
 *
 * Usage:
 *   GET  /snapshot          what the current snapshot holds
 *   POST /snapshot/refresh  reload every source now
 */
@Controller('snapshot')
export class SnapshotController {
  constructor(private readonly dataLoader: DataLoaderService) {}

  @Get()
  async summary(): Promise<SnapshotSummary> {
    return summarizeSnapshot(await this.dataLoader.getSnapshot());
  }

  @Post('refresh')
  @HttpCode(200)
  async refresh(): Promise<SnapshotSummary> {
    return summarizeSnapshot(await this.dataLoader.refresh());
  }
}
