import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { YoutubeModule } from './integrations/youtube/youtube.module';
import { ScrapeModule } from './scrape/scrape.module';
import { validateEnv } from './config/env.validation';

@Module({})
export class AppModule {
  /** Validates the environment when called; throws ConfigurationError. */
  static forRoot(options: { envFilePath?: string } = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: options.envFilePath ?? '.env',
          validate: validateEnv,
        }),
        YoutubeModule,
        ScrapeModule,
      ],
    };
  }
}
