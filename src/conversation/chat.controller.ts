import {
  Body,
  Controller,
  Delete,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
} from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ChatReplyDto, SessionCreatedDto, TurnDto } from './dto/chat-response.dto';
import { SendMessageDto } from './dto/send-message.dto';
import { Turn } from './entities/turn.entity';
import { SessionStoreService } from './session-store.service';

export const CHAT_PAGE_PATH = join(__dirname, '..', '..', 'public', 'chat.html');

export const EXAMPLE_QUESTIONS = [
  "What's Apple's stock price?",
  'Convert 100 USD to PKR',
  'Show me Tesla stock',
  'Latest market news',
  'I invested $10000 and now have $15000 after 3 years',
];

function toTurnDto(turn: Turn): TurnDto {
  return { role: turn.role, text: turn.text, timestamp: turn.timestamp.toISOString() };
}

@Controller('chat')
export class ChatController {
  private page?: string;

  constructor(private readonly sessions: SessionStoreService) {}

  /**
   * Browser chat front end.
   *
   * GET /chat
   */
  @Get()
  @Header('Content-Type', 'text/html; charset=utf-8')
  async getChatPage(): Promise<string> {
    if (this.page === undefined) {
      this.page = await readFile(CHAT_PAGE_PATH, 'utf8');
    }
    return this.page;
  }

  /** GET /chat/examples */
  @Get('examples')
  @HttpCode(HttpStatus.OK)
  getExamples(): { examples: string[] } {
    return { examples: [...EXAMPLE_QUESTIONS] };
  }

  /**
   * Opens a new conversation with an empty history.
   *
   * POST /chat/sessions
   */
  @Post('sessions')
  @HttpCode(HttpStatus.CREATED)
  createSession(): SessionCreatedDto {
    const handle = this.sessions.create();
    return { sessionId: handle.sessionId, createdAt: handle.createdAt.toISOString() };
  }

  /**
   * Ends a session; its history is discarded. The page calls this on unload.
   *
   * DELETE /chat/sessions/:id
   */
  @Delete('sessions/:id')
  @HttpCode(HttpStatus.OK)
  closeSession(@Param('id', ParseUUIDPipe) sessionId: string): { sessionId: string; message: string } {
    this.sessions.remove(sessionId);
    return { sessionId, message: 'Chat session closed' };
  }

  /** GET /chat/sessions/:id/messages */
  @Get('sessions/:id/messages')
  @HttpCode(HttpStatus.OK)
  getMessages(@Param('id', ParseUUIDPipe) sessionId: string): { sessionId: string; turns: TurnDto[] } {
    const session = this.sessions.get(sessionId);
    return { sessionId, turns: session.getTurns().map(toTurnDto) };
  }

  /**
   * Sends a message and returns the reply with the updated history.
   *
   * POST /chat/sessions/:id/messages
   * @returns 200; runtime failures still answer with the generic reply
   */
  @Post('sessions/:id/messages')
  @HttpCode(HttpStatus.OK)
  async sendMessage(
    @Param('id', ParseUUIDPipe) sessionId: string,
    @Body() sendMessageDto: SendMessageDto,
  ): Promise<ChatReplyDto> {
    const session = this.sessions.get(sessionId);
    const reply = await session.submit(sendMessageDto.text);
    return { sessionId, reply, turns: session.getTurns().map(toTurnDto) };
  }

  /**
   * Clears the history; the session id stays valid.
   *
   * DELETE /chat/sessions/:id/messages
   */
  @Delete('sessions/:id/messages')
  @HttpCode(HttpStatus.OK)
  clearMessages(@Param('id', ParseUUIDPipe) sessionId: string): { sessionId: string; message: string } {
    this.sessions.get(sessionId).clear();
    return { sessionId, message: 'Chat history cleared' };
  }
}
