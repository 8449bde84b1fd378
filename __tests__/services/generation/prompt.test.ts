import { describe, it, expect } from 'vitest';
import { buildContext, buildPrompt, STYLE_INSTRUCTIONS } from '../../../src/services/generation/prompt';
import { makeReply, makeThread } from '../../helpers';

describe('buildContext', () => {
  const thread = makeThread({
    title: 'Golden visa docs',
    source: 'dubai',
    score: 12,
    numComments: 3,
    body: 'Which documents need translating?',
  });

  it('should summarize the thread and quote only positive replies', () => {
    const context = buildContext(thread, [
      makeReply({ score: 8, body: 'Get them attested first.' }),
      makeReply({ score: 0, body: 'meh' }),
      makeReply({ score: 3, body: 'Use a certified translator.' }),
    ]);

    expect(context).toBe(
      [
        'ORIGINAL POST TITLE: Golden visa docs',
        'SUBREDDIT: r/dubai',
        'ENGAGEMENT: 12 upvotes, 3 comments',
        '',
        'POST CONTENT:',
        'Which documents need translating?',
        '',
        'TOP INSIGHTS FROM COMMENTS:',
        '',
        '1. (Score: 8)',
        'Get them attested first.',
        '',
        '3. (Score: 3)',
        'Use a certified translator.',
      ].join('\n')
    );
  });

  it('should leave out empty sections', () => {
    const context = buildContext(makeThread({ title: 'Short', source: 'UAE', score: 1, numComments: 0 }), []);

    expect(context).toBe(['ORIGINAL POST TITLE: Short', 'SUBREDDIT: r/UAE', 'ENGAGEMENT: 1 upvotes, 0 comments'].join('\n'));
  });

  it('should cap the body and the number of quoted replies', () => {
    const replies = [1, 2, 3, 4, 5, 6].map(n => makeReply({ score: n, body: `reply-${n}` }));
    const context = buildContext(makeThread({ body: 'b'.repeat(1500) }), replies);

    expect(context).toContain(`\n${'b'.repeat(1000)}\n`);
    expect(context).not.toContain('b'.repeat(1001));
    expect(context).toContain('reply-5');
    expect(context).not.toContain('reply-6');
  });
});

describe('buildPrompt', () => {
  it('should embed the context and the style instructions', () => {
    const prompt = buildPrompt('CONTEXT-MARKER', 'educational');

    expect(prompt).toContain('REDDIT CONTEXT:\nCONTEXT-MARKER\n');
    expect(prompt).toContain(STYLE_INSTRUCTIONS.educational);
    expect(prompt).toContain('CALL TO ACTION:');
  });

  it('should drop the call to action on request', () => {
    expect(buildPrompt('ctx', 'storytelling', false)).not.toContain('CALL TO ACTION:');
  });
});
