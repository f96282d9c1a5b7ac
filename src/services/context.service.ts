import { ExtractedContext, Intent, PreferredTime, ServiceType } from '../types/conversation';
import { MessageClassifierService } from './classifier.service';

const SERVICE_PATTERNS: { pattern: RegExp; service: ServiceType }[] = [
  { pattern: /\b(plumb\w*|pipes?|leak\w*|faucets?|toilets?|drains?|sinks?|water heater)\b/i, service: 'plumbing' },
  { pattern: /\b(electric\w*|outlets?|breakers?|wiring|light fixtures?)\b/i, service: 'electrical' },
  { pattern: /\b(hvac|furnace|air condition\w*|a\/c|ac unit|heat pump|thermostat)\b/i, service: 'hvac' },
  { pattern: /\b(carpentry|carpenter|cabinets?|decks?|trim|doors?)\b/i, service: 'carpentry' },
  { pattern: /\b(paint\w*|drywall)\b/i, service: 'painting' },
  { pattern: /\b(appliances?|dishwasher|washer|dryer)\b/i, service: 'appliance' },
  { pattern: /\bhandyman\b/i, service: 'handyman' },
  { pattern: /\b(repair\w*|fix\w*|broken)\b/i, service: 'repair' },
];

const TIME_PATTERNS: { pattern: RegExp; time: PreferredTime }[] = [
  { pattern: /\bmorning\b/i, time: 'morning' },
  { pattern: /\bafternoon\b/i, time: 'afternoon' },
  { pattern: /\b(evening|tonight)\b/i, time: 'evening' },
];

const CLOCK_TIME = /\b(\d{1,2})(?::\d{2})?\s*(am|pm)\b/i;

const DAY_PATTERN =
  /\b(today|tomorrow|this week|next week|weekend|monday|tuesday|wednesday|thursday|friday|saturday|sunday)\b/i;

const HIGH_URGENCY = /\b(immediately|right away|right now)\b/i;
const MEDIUM_URGENCY = /\b(soon|today|this week)\b/i;

const INTENT_PATTERNS: { pattern: RegExp; intent: Intent }[] = [
  { pattern: /\b(schedule|appointment|book)\b/i, intent: 'schedule_appointment' },
  { pattern: /\b(quote|price|cost|estimate)\b/i, intent: 'get_quote' },
  { pattern: /\b(emergency|urgent)\b/i, intent: 'emergency_service' },
  { pattern: /\b(question|info|information|tell me)\b/i, intent: 'get_information' },
];

export class ContextExtractionService {
  constructor(private classifier: MessageClassifierService = new MessageClassifierService()) {}

  /**
   * Pulls whatever context fields can be positively identified from one message.
   * Fields that are not found are left off entirely so a merge never clears earlier values.
   */
  extract(text: string | null | undefined): ExtractedContext {
    const content = text ?? '';
    if (content.trim().length === 0) return {};

    const context: ExtractedContext = {};

    const service = SERVICE_PATTERNS.find(({ pattern }) => pattern.test(content));
    if (service) context.service_type = service.service;

    const preferredTime = this.extractPreferredTime(content);
    if (preferredTime) context.preferred_time = preferredTime;

    const day = content.match(DAY_PATTERN);
    if (day) context.preferred_day = day[1].toLowerCase();

    const emergency = this.classifier.isEmergency(content);
    if (emergency) {
      context.is_emergency = true;
      context.urgency = 'high';
    } else if (HIGH_URGENCY.test(content)) {
      context.urgency = 'high';
    } else if (MEDIUM_URGENCY.test(content)) {
      context.urgency = 'medium';
    }

    const intent = INTENT_PATTERNS.find(({ pattern }) => pattern.test(content));
    if (intent) context.intent = intent.intent;

    return context;
  }

  private extractPreferredTime(text: string): PreferredTime | undefined {
    const named = TIME_PATTERNS.find(({ pattern }) => pattern.test(text));
    if (named) return named.time;

    const clock = text.match(CLOCK_TIME);
    if (!clock) return undefined;

    const hour = parseInt(clock[1], 10);
    // 12am is midnight
    if (clock[2].toLowerCase() === 'am') return hour === 12 ? 'evening' : 'morning';
    if (hour === 12 || hour < 5) return 'afternoon';
    return 'evening';
  }
}
