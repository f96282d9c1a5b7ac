import { MessageType } from '../types/conversation';
import { containsKeyword, findKeyword } from '../utils/keywords';

// Phrases, not bare nouns: "smoke detector", "flood light" and "fire alarm" are routine jobs.
export const EMERGENCY_KEYWORDS = [
  'emergency', 'urgent', 'asap', 'flooding', 'flooded', 'gas leak', 'smell gas', 'smells like gas',
  'burst pipe', 'pipe burst', 'pipes burst', 'on fire', 'caught fire', 'smoke coming', 'smoking outlet',
  'sparking', 'no heat', 'power is out', 'power went out', 'lost power', 'leaking badly',
] as const;

const APPOINTMENT_KEYWORDS = [
  'appointment', 'schedule', 'book', 'booking', 'available', 'availability',
  'come out', 'come by', 'set up a time',
] as const;

const QUOTE_KEYWORDS = [
  'quote', 'price', 'pricing', 'cost', 'estimate', 'how much', 'rates',
] as const;

const CONFIRMATION_KEYWORDS = [
  'yes', 'yeah', 'yep', 'confirm', 'confirmed', 'ok', 'okay', 'sure', 'sounds good',
  'works', 'that works', 'perfect', 'great',
] as const;

const GREETING_KEYWORDS = [
  'hello', 'hi', 'hey', 'good morning', 'good afternoon', 'good evening',
] as const;

const QUESTION_KEYWORDS = [
  'what', 'when', 'where', 'how', 'why', 'who', 'which', 'can you', 'could you',
  'do you', 'is there', 'are you',
] as const;

// Checked in order; the first family with a hit decides. Emergency is handled before this list.
const CLASSIFICATION_ORDER: { type: MessageType; keywords: readonly string[] }[] = [
  { type: 'appointment_request', keywords: APPOINTMENT_KEYWORDS },
  { type: 'quote_request', keywords: QUOTE_KEYWORDS },
  { type: 'confirmation', keywords: CONFIRMATION_KEYWORDS },
  { type: 'greeting', keywords: GREETING_KEYWORDS },
];

export class MessageClassifierService {
  classify(text: string | null | undefined): MessageType {
    const lower = (text ?? '').trim().toLowerCase();
    if (lower.length === 0) return 'other';

    if (this.isEmergency(lower)) return 'emergency';

    for (const { type, keywords } of CLASSIFICATION_ORDER) {
      if (findKeyword(lower, keywords)) return type;
    }

    if (lower.includes('?') || findKeyword(lower, QUESTION_KEYWORDS)) {
      return 'question';
    }

    return 'other';
  }

  isEmergency(text: string | null | undefined): boolean {
    const lower = (text ?? '').toLowerCase();
    return EMERGENCY_KEYWORDS.some((kw) => containsKeyword(lower, kw));
  }
}
