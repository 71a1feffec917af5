import { Body, Controller, Get, Header, Post, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import {
  ExportQuerySchema,
  FeedbackSchema,
  ReactionSchema,
  StatsQuerySchema,
} from '../ai/schemas';
import { FeedbackAggregatorService } from './feedback-aggregator.service';

@Controller('feedback')
export class FeedbackController {
  constructor(private readonly feedback: FeedbackAggregatorService) {}

  @Post()
  async record(@Body() body: unknown) {
    const input = FeedbackSchema.parse(body);
    return this.feedback.record(
      { conversationId: input.conversationId, answerId: input.answerId },
      input.author,
      input.kind,
      input.comment,
    );
  }

  @Post('reactions')
  async reaction(@Body() body: unknown) {
    const event = ReactionSchema.parse(body);
    const recorded = await this.feedback.recordReaction(event);
    return { recorded: recorded !== null, feedback: recorded };
  }

  @Get('stats')
  async stats(@Query() query: unknown) {
    const { from, to, groupBy } = StatsQuerySchema.parse(query);
    return this.feedback.stats({ from, to }, groupBy);
  }

  @Get('export')
  @Header('Cache-Control', 'no-store')
  async export(@Query() query: unknown, @Res({ passthrough: true }) res: Response) {
    const { from, to, format } = ExportQuerySchema.parse(query);
    res.type(format === 'csv' ? 'text/csv' : 'application/json');
    return this.feedback.export({ from, to }, format);
  }
}
