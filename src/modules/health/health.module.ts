import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { IpmaModule } from '../ipma/ipma.module';

@Module({
  imports: [IpmaModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
