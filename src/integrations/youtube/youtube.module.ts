import { Module, Global } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { createYoutubeHttp, YoutubeClient } from './youtube.client';

/** Axios instance the client talks through; tests swap in a stub adapter. */
export const YOUTUBE_HTTP = Symbol('YOUTUBE_HTTP');

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: YOUTUBE_HTTP,
      useFactory: (cfg: ConfigService) => createYoutubeHttp(cfg),
      inject: [ConfigService],
    },
    {
      provide: YoutubeClient,
      useFactory: (cfg: ConfigService, http: AxiosInstance) =>
        new YoutubeClient(cfg, http),
      inject: [ConfigService, YOUTUBE_HTTP],
    },
  ],
  exports: [YoutubeClient],
})
export class YoutubeModule {}
