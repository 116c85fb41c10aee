import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import catalogConfig from './config/catalog.config';
import dashboardConfig from './config/dashboard.config';
import { CatalogModule } from './modules/catalog/catalog.module';
import { InsightsModule } from './modules/insights/insights.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [catalogConfig, dashboardConfig],
    }),
    CatalogModule,
    InsightsModule,
  ],
})
export class AppModule {}
