import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './auth/auth.module';
import { DataModule } from './data/data.module';
import { IndicatorsModule } from './indicators/indicators.module';
import { StrategyModule } from './strategy/strategy.module';
import { AnalysisModule } from './analysis/analysis.module';
import { ScannerModule } from './scanner/scanner.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['../../.env', '.env'],
    }),
    ScheduleModule.forRoot(),
    DatabaseModule,
    AuthModule,
    DataModule,
    IndicatorsModule,
    StrategyModule,
    AnalysisModule,
    ScannerModule,
  ],
})
export class AppModule {}
