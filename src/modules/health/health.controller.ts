import { Controller, Get } from '@nestjs/common';
import { HealthService } from './health.service';
import { PingResponseDto } from './dto/Ping.response.dto';
import { InfoResponseDto } from './dto/Info.response.dto';

@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get('ping')
  public ping(): PingResponseDto {
    return new PingResponseDto(this.healthService.ping());
  }

  @Get('info')
  public info(): InfoResponseDto {
    return new InfoResponseDto(this.healthService.info());
  }
}
