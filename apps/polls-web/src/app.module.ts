import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { SharedModule } from '@app/shared';
import { PollsModule } from './polls/polls.module';
import { AdminModule } from './admin/admin.module';
import { HtmlExceptionFilter } from './common/html-exception.filter';

@Module({
  imports: [SharedModule, PollsModule, AdminModule],
  providers: [{ provide: APP_FILTER, useClass: HtmlExceptionFilter }],
})
export class AppModule {}
