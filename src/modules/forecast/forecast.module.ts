import { Module } from '@nestjs/common';
import { IpmaModule } from '../ipma/ipma.module';
import { ForecastController } from './forecast.controller';
import { ForecastService } from './forecast.service';

@Module({
  imports: [IpmaModule],
  controllers: [ForecastController],
  providers: [ForecastService],
})
export class ForecastModule {}
