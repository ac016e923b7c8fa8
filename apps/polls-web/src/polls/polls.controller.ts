import {
  Body,
  Controller,
  Get,
  Header,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Res,
} from '@nestjs/common';
import { Response } from 'express';
import { PollsService } from './polls.service';
import { buildIndexPage } from './formatters/index-page.formatter';
import { buildDetailPage } from './formatters/detail-page.formatter';
import { buildResultsPage } from './formatters/results-page.formatter';

const HTML = 'text/html; charset=utf-8';

// Non-numeric ids don't match any question URL.
const questionIdPipe = new ParseIntPipe({
  errorHttpStatusCode: HttpStatus.NOT_FOUND,
});

export function resultsUrl(questionId: number): string {
  return `/polls/${questionId}/results/`;
}

@Controller('polls')
export class PollsController {
  constructor(private readonly pollsService: PollsService) {}

  @Get()
  @Header('Content-Type', HTML)
  async index(): Promise<string> {
    const context = await this.pollsService.getIndexContext();
    return buildIndexPage(context);
  }

  @Get(':id')
  @Header('Content-Type', HTML)
  async detail(@Param('id', questionIdPipe) id: number): Promise<string> {
    const context = await this.pollsService.getDetailContext(id);
    return buildDetailPage(context);
  }

  @Get(':id/results')
  @Header('Content-Type', HTML)
  async results(@Param('id', questionIdPipe) id: number): Promise<string> {
    const question = await this.pollsService.getPublishedQuestion(id);
    return buildResultsPage(question);
  }

  @Post(':id/vote')
  async vote(
    @Param('id', questionIdPipe) id: number,
    @Body() form: unknown,
    @Res() res: Response,
  ): Promise<void> {
    const outcome = await this.pollsService.vote(id, form);
    if (outcome.status === 'rejected') {
      res.status(HttpStatus.OK).type('html').send(buildDetailPage(outcome.context));
      return;
    }
    res.redirect(HttpStatus.FOUND, resultsUrl(id));
  }
}
