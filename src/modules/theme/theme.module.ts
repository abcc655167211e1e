import { Module } from '@nestjs/common';
import { ContentFiltersModule } from '../content-filters/content-filters.module';
import { FieldsModule } from '../fields/fields.module';
import { WpdbModule } from '../wpdb/wpdb.module';
import { ThemeController } from './theme.controller';
import { ThemeService } from './theme.service';

@Module({
  imports: [FieldsModule, WpdbModule, ContentFiltersModule],
  controllers: [ThemeController],
  providers: [ThemeService],
})
export class ThemeModule {}
