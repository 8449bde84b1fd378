import type { PostStyle, Reply, Thread } from '../../types';

const BODY_CONTEXT_LIMIT = 1000;
const REPLY_CONTEXT_LIMIT = 400;
const MAX_CONTEXT_REPLIES = 5;

export const STYLE_INSTRUCTIONS: Record<PostStyle, string> = {
  professional: `Write in a professional, authoritative tone. Focus on providing value and
establishing expertise. Use clear, concise language that appeals to business
professionals and expats in the UAE.`,
  empathetic: `Write with empathy and understanding. Acknowledge the challenges people face
with bureaucracy and paperwork in a new country. Be warm and supportive while
offering solutions.`,
  educational: `Write in an educational, informative tone. Break down complex processes into
simple steps. Help readers understand the "why" behind requirements.`,
  storytelling: `Use a storytelling approach. Start with a relatable scenario or common
situation, then guide readers to the solution. Make it engaging and personal.`,
};

const CALL_TO_ACTION = `CALL TO ACTION:
End with a subtle but effective call to action that:
- Introduces OnlineTranslation.ae as a helpful resource
- Mentions their services: certified legal translations, document attestation,
  Arabic-English translations, visa/legal document processing
- Feels natural, not salesy
- Invites engagement (comments, questions, DMs)`;

/**
 * Summarize a thread and its best replies for the prompt. Only replies with a
 * positive score are quoted.
 */
export function buildContext(thread: Thread, replies: readonly Reply[]): string {
  const parts = [
    `ORIGINAL POST TITLE: ${thread.title}`,
    `SUBREDDIT: r/${thread.source}`,
    `ENGAGEMENT: ${thread.score} upvotes, ${thread.numComments} comments`,
  ];

  if (thread.body) {
    parts.push(`\nPOST CONTENT:\n${thread.body.slice(0, BODY_CONTEXT_LIMIT)}`);
  }

  if (replies.length > 0) {
    parts.push('\nTOP INSIGHTS FROM COMMENTS:');
    replies.slice(0, MAX_CONTEXT_REPLIES).forEach((reply, i) => {
      if (reply.score > 0) {
        parts.push(`\n${i + 1}. (Score: ${reply.score})\n${reply.body.slice(0, REPLY_CONTEXT_LIMIT)}`);
      }
    });
  }

  return parts.join('\n');
}

export function buildPrompt(context: string, style: PostStyle, includeCta: boolean = true): string {
  return `You are a LinkedIn content creator for OnlineTranslation.ae, a professional
legal translation and document services company based in Dubai, UAE.

Based on this Reddit discussion from the UAE community, create an engaging LinkedIn post
that addresses the topic/issue raised and positions OnlineTranslation.ae as a helpful solution.

REDDIT CONTEXT:
${context}

STYLE INSTRUCTIONS:
${STYLE_INSTRUCTIONS[style]}

${includeCta ? CALL_TO_ACTION : ''}

FORMATTING REQUIREMENTS:
1. Start with a hook - a question, bold statement, or relatable situation
2. Keep paragraphs short (2-3 sentences max) for mobile readability
3. Use line breaks between paragraphs for visual breathing room
4. Include 3-5 relevant emojis strategically placed (not overdone)
5. End with 8-12 relevant hashtags on a new line
6. Total length: 150-250 words (excluding hashtags)

HASHTAG SUGGESTIONS (choose relevant ones):
#DubaiLife #UAE #Expats #Dubai #AbuDhabi #LegalTranslation #ArabicTranslation
#VisaUAE #DocumentAttestation #UAEBusiness #ExpatLife #DubaiExpats
#LegalServices #Translation #CertifiedTranslation #MovingToDubai
#UAEResidents #BusinessSetup #FreezoneUAE #GoldenVisa

Generate ONLY the LinkedIn post content. No explanations or meta-commentary.`;
}
