import { Module, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IndicatorEngine } from './indicator-engine.service';
import { IndicatorProvider, INDICATOR_PROVIDER } from './indicator.types';
import { TechnicalIndicatorsProvider } from './providers/technical-indicators.provider';
import { ManualIndicatorProvider } from './providers/manual.provider';

export function createIndicatorProvider(kind: string | undefined): IndicatorProvider {
  switch (kind) {
    case undefined:
    case '':
    case 'library':
      return new TechnicalIndicatorsProvider();
    case 'manual':
      return new ManualIndicatorProvider();
    default:
      new Logger('IndicatorsModule').warn(`Unknown INDICATOR_PROVIDER "${kind}", using library`);
      return new TechnicalIndicatorsProvider();
  }
}

@Module({
  providers: [
    {
      provide: INDICATOR_PROVIDER,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        createIndicatorProvider(config.get<string>('INDICATOR_PROVIDER')),
    },
    IndicatorEngine,
  ],
  exports: [IndicatorEngine],
})
export class IndicatorsModule {}
