// File overview:
// - Purpose: Lightweight liveness and version endpoints.
// - Reached from: `AppModule` controller wiring at '/' and '/version'.
// - Provides: API name with current UTC time, and build/version metadata.
import { Controller, Get, Logger } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { MessageResponse } from '../common/dto/responses';
import { getVersionInfo, VersionInfo } from '../version/version-info';

/** ISO-8601 in UTC with whole seconds, e.g. 2024-02-14T14:42:35Z */
export function utcTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

@ApiTags('health')
@Controller('/')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  /** Used as a health check to verify the API is up and responding. */
  @Get()
  @ApiOkResponse({ type: MessageResponse, description: 'API name with current datetime' })
  getRoot(): MessageResponse {
    const datetime = utcTimestamp();
    this.logger.debug(`Root: ${datetime}`);
    return { message: `${getVersionInfo().name} ${datetime}` };
  }

  @Get('version')
  @ApiOkResponse({ type: VersionInfo, description: 'Version information' })
  getVersion(): VersionInfo {
    const info = getVersionInfo();
    this.logger.debug(`Version: ${info.version}`);
    return info;
  }
}
