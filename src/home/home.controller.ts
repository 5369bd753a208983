import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { HomeService } from './home.service';
import { HealthReport, HealthService } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description: 'Name and environment of the API. This is a public endpoint.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'doc-standards-api' },
        environment: { type: 'string', example: 'production' },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health')
  @ApiOperation({
    summary: 'Health Check',
    description:
      'Database reachability and validation worker activity. Responds 503 ' +
      'when the database is unreachable.',
  })
  @ApiOkResponse({
    description: 'Health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        database: {
          type: 'object',
          properties: { accessible: { type: 'boolean', example: true } },
        },
        worker: {
          type: 'object',
          properties: {
            id: { type: 'string', example: 'api-7f9c:1:3b2a61c0' },
            activeJobs: { type: 'number', example: 1 },
          },
        },
      },
    },
  })
  async health(): Promise<HealthReport> {
    const report = await this.healthService.check();
    if (report.status !== 'healthy') {
      throw new ServiceUnavailableException(report);
    }
    return report;
  }
}
