// packages/playlist-backend/src/application/stages/retrieve-candidates.ts
import { PermanentError } from '@vibelist/contracts';

import type { CandidateSet, RequestInterpretation } from '../../domain/playlist-model.js';
import type { ChatClient } from '../../infrastructure/chat-client.js';
import { researchPrompt } from './prompts.js';
import type { Stage, StageContext } from './types.js';

// Roughly 3.5 minutes per track, with headroom for songs the platform cannot match.
const MINUTES_PER_TRACK = 3.5;
const MIN_CANDIDATES = 15;
const MAX_CANDIDATES = 60;

export function targetCandidateCount(durationMinutes: number): number {
  const estimate = Math.ceil((durationMinutes / MINUTES_PER_TRACK) * 1.25);
  return Math.min(MAX_CANDIDATES, Math.max(MIN_CANDIDATES, estimate));
}

/** Asks the search model for candidate songs matching the vibe. */
export class RetrieveCandidatesStage implements Stage<RequestInterpretation, CandidateSet> {
  readonly name = 'retrieve';
  readonly label = 'Searching over millions of sources...';

  constructor(
    private readonly chat: ChatClient,
    private readonly model: string,
  ) {}

  async run(input: RequestInterpretation, ctx: StageContext): Promise<CandidateSet> {
    const target = targetCandidateCount(input.request.durationMinutes);
    const research = await this.chat.complete({
      model: this.model,
      messages: [
        { role: 'system', content: researchPrompt(input.context, input.request.description, target) },
        { role: 'user', content: 'Start the research.' },
      ],
      temperature: 0.7,
      signal: ctx.signal,
    });

    if (!research) {
      throw new PermanentError('Candidate search returned no results');
    }

    return { ...input, research };
  }
}
