import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { IpmaClientService } from './ipma-client.service';
import { IpmaHttpService } from './ipma-http.service';
import { IPMA_SETTINGS, loadIpmaSettings } from './ipma-settings';

@Module({
  imports: [ConfigModule],
  providers: [
    IpmaHttpService,
    IpmaClientService,
    {
      provide: IPMA_SETTINGS,
      inject: [ConfigService],
      useFactory: loadIpmaSettings,
    },
  ],
  exports: [IpmaClientService, IPMA_SETTINGS],
})
export class IpmaModule {}
