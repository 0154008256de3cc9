import { Module } from '@nestjs/common';
import { IpmaModule } from '../ipma/ipma.module';
import { LocalitiesController } from './localities.controller';
import { LocalitiesService } from './localities.service';

@Module({
  imports: [IpmaModule],
  controllers: [LocalitiesController],
  providers: [LocalitiesService],
})
export class LocalitiesModule {}
