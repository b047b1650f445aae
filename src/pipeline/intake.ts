import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { EmptyInputError } from '../errors';
import { Query } from '../types';

const EXIT_COMMANDS = new Set(['exit', 'quit', 'q']);

const queryTextSchema = z.string().trim().min(1);

export const isExitCommand = (raw: string): boolean => EXIT_COMMANDS.has(raw.trim().toLowerCase());

export const accept = (raw: string, now: () => Date = () => new Date()): Query => {
  const validation = queryTextSchema.safeParse(raw);

  if (!validation.success) {
    throw new EmptyInputError();
  }

  return {
    id: uuidv4(),
    text: validation.data,
    timestamp: now(),
  };
};
