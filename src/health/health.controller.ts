import { Controller, Get, Inject, ServiceUnavailableException } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import {
  ApiOkResponse,
  ApiOperation,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { Public } from '../common/decorators/public.decorator';
import { ApiErrorResponse } from '../common/swagger/api-error-response.dto';
import storeConfig from '../config/store.config';
import { StoreService } from '../store/store.service';
import { HealthResponseDto } from './dto/health-response.dto';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly store: StoreService,
    @Inject(storeConfig.KEY) private readonly config: Pick<ConfigType<typeof storeConfig>, 'driver'>,
  ) {}

  @Public()
  @Get()
  @ApiOperation({ summary: 'Service health check' })
  @ApiOkResponse({ description: 'Service is healthy', type: HealthResponseDto })
  @ApiServiceUnavailableResponse({ description: 'Store is unavailable', type: ApiErrorResponse })
  async getHealth(): Promise<HealthResponseDto> {
    const start = Date.now();
    try {
      await this.store.ping();
    } catch (error) {
      throw new ServiceUnavailableException({
        message: 'Store is unavailable',
        errorCode: 'STORE_UNAVAILABLE',
        store: {
          status: 'down',
          driver: this.config.driver,
          message: error instanceof Error ? error.message : String(error),
        },
      });
    }

    return {
      status: 'ok',
      store: { status: 'up', driver: this.config.driver, responseTime: `${Date.now() - start}ms` },
      heapUsed: `${Math.round(process.memoryUsage().heapUsed / 1024 / 1024)}MB`,
    };
  }
}
