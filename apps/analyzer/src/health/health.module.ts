import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TerminusModule } from '@nestjs/terminus';
import { HttpModule } from '@nestjs/axios';
import { HealthController } from './health.controller';
import { WeatherProviderHealthIndicator } from './indicators/weather-provider.health';

@Module({
  imports: [
    ConfigModule,
    TerminusModule,
    HttpModule.register({
      timeout: 5000,
      maxRedirects: 0,
    }),
  ],
  controllers: [HealthController],
  providers: [WeatherProviderHealthIndicator],
  exports: [WeatherProviderHealthIndicator],
})
export class HealthModule {}
