/** Ad style catalogue. Each style is "Family - Variant"; the description tells
 * the writer and the judge what the viewer should feel, not how to structure it. */

export const AD_STYLE_DESCRIPTIONS: Record<string, string> = {
  'Humor - Hilarious':
    'Over-the-top funny, designed to make people laugh out loud. Should be relatable and genuinely funny.',
  'Humor - Playful': 'Light, whimsical, charming humor that makes you smile.',
  'Humor - Sarcastic/Witty': 'Dry, clever, deadpan humor with wit.',
  'Sentiment - Heartwarming': 'Gentle, touching moments that make you smile with warmth.',
  'Sentiment - Tear-jerking': 'Intensely emotional, designed to move viewers to tears (happy tears).',
  'Sentiment - Nostalgic': 'Wistful, reflective, bittersweet emotions about the past.',
  'Achievement - Inspirational':
    'Uplifting, motivating narrative about overcoming challenges and achieving goals.',
  'Achievement - Empowering':
    'Fierce, bold, confident narrative about breaking barriers and showing strength.',
  'Achievement - Understated': 'Quiet determination and subtle resilience leading to triumph.',
  'Adventure - Thrilling': 'High-energy, exciting, fast-paced journey with escalating thrills.',
  'Adventure - Wonder-filled': 'Awe-inspiring, discovery-focused journey that creates wonder.',
  'Adventure - Epic': 'Grand scale, cinematic, larger-than-life adventure.',
  'Reversal - Thought-provoking':
    'Makes you think differently, challenges assumptions with insight.',
  'Reversal - Mind-blowing': 'Shocking twist that completely recontextualizes everything.',
  'Reversal - Clever': "Witty, intellectually satisfying twist that makes you say 'ahh, nice!'",
};

export const AD_STYLES = Object.keys(AD_STYLE_DESCRIPTIONS);

const FALLBACK_DESCRIPTION = 'Compelling advertising that resonates with viewers.';

/** Unknown styles are allowed; they get a generic description. */
export function describeAdStyle(style: string): string {
  return AD_STYLE_DESCRIPTIONS[style] ?? FALLBACK_DESCRIPTION;
}

export function isKnownAdStyle(style: string): boolean {
  return Object.hasOwn(AD_STYLE_DESCRIPTIONS, style);
}
