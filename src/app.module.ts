import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ContentFiltersModule } from './modules/content-filters/content-filters.module';
import { FieldsModule } from './modules/fields/fields.module';
import { HealthModule } from './modules/health/health.module';
import { ThemeModule } from './modules/theme/theme.module';
import { WpdbModule } from './modules/wpdb/wpdb.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    WpdbModule,
    ContentFiltersModule,
    FieldsModule,
    ThemeModule,
    HealthModule,
  ],
})
export class AppModule {}
