import { Body, Controller, Post, Req } from '@nestjs/common';
import type { Request } from 'express';
import { AskSchema } from '../ai/schemas';
import { ChatService } from './chat.service';

@Controller('chat')
export class ChatController {
  constructor(private readonly chat: ChatService) {}

  @Post()
  async ask(@Body() body: unknown, @Req() req: Request) {
    const input = AskSchema.parse(body);

    // stop generating once the client has gone away
    const controller = new AbortController();
    const onClose = () => controller.abort();
    req.socket.once('close', onClose);

    try {
      return await this.chat.ask(input, controller.signal);
    } finally {
      req.socket.off('close', onClose);
    }
  }
}
