import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ApiResponse } from '../../common/interfaces/api-response.interface';

export interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  uptime: number;
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  @Get()
  @ApiOperation({ summary: 'Liveness check, no authentication' })
  check(): ApiResponse<HealthStatus> {
    return {
      success: true,
      message: 'Courses API is running',
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    };
  }
}
