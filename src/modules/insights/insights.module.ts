import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { InsightsService } from './insights.service';

@Module({
  imports: [CatalogModule],
  providers: [InsightsService],
  exports: [InsightsService],
})
export class InsightsModule {}
