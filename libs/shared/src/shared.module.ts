import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  serverConfig,
  pathsConfig,
  pollsConfig,
  adminConfig,
  loggingConfig,
} from './config/configuration';
import { validationSchema } from './config/validation.schema';
import { PollsStore } from './storage/polls.store';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [serverConfig, pathsConfig, pollsConfig, adminConfig, loggingConfig],
      validationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
  ],
  providers: [PollsStore],
  exports: [ConfigModule, PollsStore],
})
export class SharedModule {}
