import { Module } from '@nestjs/common';
import { PolygonService } from './polygon.service';
import { FinnhubService } from './finnhub.service';
import { PriceHistoryClient } from './price-history.client';
import {
  PRICE_HISTORY_PROVIDER,
  LIVE_QUOTE_PROVIDER,
  FUNDAMENTALS_PROVIDER,
} from './data.types';

@Module({
  providers: [
    PolygonService,
    FinnhubService,
    PriceHistoryClient,
    { provide: PRICE_HISTORY_PROVIDER, useExisting: PolygonService },
    { provide: LIVE_QUOTE_PROVIDER, useExisting: PolygonService },
    { provide: FUNDAMENTALS_PROVIDER, useExisting: FinnhubService },
  ],
  exports: [PriceHistoryClient, LIVE_QUOTE_PROVIDER, FUNDAMENTALS_PROVIDER],
})
export class DataModule {}
