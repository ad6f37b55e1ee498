import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import ipApiConfig from '../../config/ip-api.config';
import { IpApiClient } from './services/ip-api-client.service';

@Module({
  imports: [ConfigModule.forFeature(ipApiConfig)],
  providers: [IpApiClient],
  exports: [IpApiClient],
})
export class IpApiModule {}
