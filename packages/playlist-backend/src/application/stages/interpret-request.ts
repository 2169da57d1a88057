// packages/playlist-backend/src/application/stages/interpret-request.ts
import { PermanentError } from '@vibelist/contracts';

import type { PlaylistRequest, RequestInterpretation } from '../../domain/playlist-model.js';
import type { ChatClient } from '../../infrastructure/chat-client.js';
import { VIBE_PROMPT } from './prompts.js';
import type { Stage, StageContext } from './types.js';

/** Turns the free-text description into a short "vibe" context for the search stage. */
export class InterpretRequestStage implements Stage<PlaylistRequest, RequestInterpretation> {
  readonly name = 'interpret';
  readonly label = 'Processing your request...';

  constructor(
    private readonly chat: ChatClient,
    private readonly model: string,
  ) {}

  async run(request: PlaylistRequest, ctx: StageContext): Promise<RequestInterpretation> {
    const context = await this.chat.complete({
      model: this.model,
      messages: [
        { role: 'system', content: VIBE_PROMPT },
        { role: 'user', content: request.description },
      ],
      signal: ctx.signal,
    });

    if (!context) {
      throw new PermanentError('Request interpretation returned an empty context');
    }

    ctx.logger.debug('Vibe context ready', { chars: context.length });
    return { request, context };
  }
}
