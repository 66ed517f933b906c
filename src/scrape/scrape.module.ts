import { Module } from '@nestjs/common';
import { ChannelModule } from '../channel/channel.module';
import { VideoModule } from '../video/video.module';
import { CategoryModule } from '../category/category.module';
import { ExportModule } from '../export/export.module';
import { ScrapeService } from './scrape.service';

@Module({
  imports: [ChannelModule, VideoModule, CategoryModule, ExportModule],
  providers: [ScrapeService],
  exports: [ScrapeService],
})
export class ScrapeModule {}
