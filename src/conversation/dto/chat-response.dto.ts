import { TurnRole } from '../entities/turn.entity';

export interface TurnDto {
  role: TurnRole;
  text: string;
  timestamp: string;            // ISO 8601
}

export interface SessionCreatedDto {
  sessionId: string;
  createdAt: string;
}

export interface ChatReplyDto {
  sessionId: string;
  reply: string;
  turns: TurnDto[];
}
