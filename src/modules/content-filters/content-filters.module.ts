import { Module } from '@nestjs/common';
import { ContentFilterRegistry } from './content-filter.registry';
import { SharingDisplayFilter } from './sharing-display.filter';

@Module({
  providers: [ContentFilterRegistry, SharingDisplayFilter],
  exports: [ContentFilterRegistry],
})
export class ContentFiltersModule {}
