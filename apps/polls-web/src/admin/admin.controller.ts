import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { Choice, QuestionWithChoices } from '@app/shared/types/poll.types';
import { AdminTokenGuard } from './admin-token.guard';
import { AdminService, QuestionListItem } from './admin.service';
import {
  createChoiceSchema,
  createQuestionSchema,
  listQuestionsQuerySchema,
  parseBody,
} from './admin.schemas';

@Controller('admin/questions')
@UseGuards(AdminTokenGuard)
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  @Get()
  async list(@Query() query: unknown): Promise<QuestionListItem[]> {
    const { search } = parseBody(listQuestionsQuerySchema, query);
    return this.adminService.listQuestions(search || undefined);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<QuestionWithChoices> {
    return this.adminService.getQuestion(id);
  }

  @Post()
  async create(@Body() body: unknown): Promise<QuestionWithChoices> {
    return this.adminService.createQuestion(parseBody(createQuestionSchema, body));
  }

  @Post(':id/choices')
  async addChoice(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Promise<Choice> {
    return this.adminService.addChoice(id, parseBody(createChoiceSchema, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.adminService.deleteQuestion(id);
  }
}
