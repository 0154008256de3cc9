import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HealthModule } from './modules/health/health.module';
import { IpmaModule } from './modules/ipma/ipma.module';
import { LocalitiesModule } from './modules/localities/localities.module';
import { ForecastModule } from './modules/forecast/forecast.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    IpmaModule,
    HealthModule,
    LocalitiesModule,
    ForecastModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
