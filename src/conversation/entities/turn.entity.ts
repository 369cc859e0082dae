export type TurnRole = 'user' | 'assistant';

// One side of an exchange. Frozen on creation; sessions only ever append.
export interface Turn {
  readonly role: TurnRole;
  readonly text: string;
  readonly timestamp: Date;
}

export function createTurn(role: TurnRole, text: string, timestamp: Date = new Date()): Turn {
  return Object.freeze({ role, text, timestamp });
}
