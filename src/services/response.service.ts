import { DateTime } from 'luxon';
import { ContextSummary, MessageType } from '../types/conversation';
import {
  BusinessHoursConfig,
  DEFAULT_BUSINESS_HOURS,
  getNextBusinessWindow,
  isWithinBusinessHours,
} from '../utils/businessHours';

export type ReplyTemplate =
  | 'emergency'
  | 'after_hours'
  | 'complete'
  | 'confirming'
  | 'scheduling'
  | 'quote'
  | 'welcome'
  | 'details';

export interface ComposeInput {
  summary: ContextSummary;
  messageType: MessageType;
  now?: Date;
}

export interface ComposedReply {
  template: ReplyTemplate;
  text: string;
}

export interface ResponseServiceOptions {
  timezone: string;
  businessHours?: BusinessHoursConfig;
}

// Replies are appended to the thread and classified like any other message, so
// they stay clear of the words that move the conversation state.
export class ResponseService {
  private timezone: string;
  private businessHours: BusinessHoursConfig;

  constructor(options: ResponseServiceOptions) {
    this.timezone = options.timezone;
    this.businessHours = options.businessHours ?? DEFAULT_BUSINESS_HOURS;
  }

  compose(input: ComposeInput): ComposedReply {
    const template = this.selectTemplate(input);
    return { template, text: this.render(template, input) };
  }

  selectTemplate({ summary, messageType, now }: ComposeInput): ReplyTemplate {
    if (summary.requires_human || messageType === 'emergency') return 'emergency';

    const at = DateTime.fromJSDate(now ?? new Date());
    if (!isWithinBusinessHours(this.timezone, this.businessHours, at)) return 'after_hours';

    if (summary.state === 'complete') return 'complete';
    if (summary.state === 'confirming') return 'confirming';
    if (summary.state === 'scheduling' || messageType === 'appointment_request') return 'scheduling';
    if (messageType === 'quote_request') return 'quote';
    if (messageType === 'greeting' || summary.message_count <= 1) return 'welcome';
    return 'details';
  }

  private render(template: ReplyTemplate, { summary, now }: ComposeInput): string {
    const name = typeof summary.customer_info.name === 'string' ? summary.customer_info.name : undefined;
    const namePart = name ? `, ${name}` : '';
    const service = summary.context.service_type;

    switch (template) {
      case 'emergency':
        return `${name ? `${name}, we've` : "We've"} flagged your message as a priority and a team member will call you back within 15 minutes. If anyone is in danger, call 911.`;
      case 'after_hours':
        return `Thanks for reaching out${namePart}! Our office is closed at the moment. We'll reply ${this.nextOpening(now)}.`;
      case 'complete':
        return `Thanks${namePart}, you're all set. Text us anytime if anything else comes up.`;
      case 'confirming':
        return `Thanks${namePart}! We have you down for ${this.describeWhen(summary)}. A technician will text before arriving. Reply CHANGE if you need a different time.`;
      case 'scheduling':
        return `Happy to get ${service ? `your ${service} job` : 'you'} on the calendar${namePart}. What day and time suit you best?`;
      case 'quote':
        return `Pricing depends on the job${namePart}. Could you send a short description or a photo of the ${service ?? 'work'} so we can give you a number?`;
      case 'welcome':
        return `Thanks for reaching out${namePart}! This is Karen. What can we help you with around the house?`;
      case 'details':
        return `Got it${namePart}. Could you share a few more details about the job and the address?`;
    }
  }

  private describeWhen(summary: ContextSummary): string {
    const parts = [summary.context.preferred_day, summary.context.preferred_time].filter(
      (part): part is string => typeof part === 'string'
    );
    return parts.length > 0 ? parts.join(' ') : 'the time you picked';
  }

  private nextOpening(now?: Date): string {
    const window = getNextBusinessWindow(this.timezone, this.businessHours, DateTime.fromJSDate(now ?? new Date()));
    if (!window) return "as soon as we're back";
    const start = window.start.setLocale('en-US');
    return `${start.toFormat('cccc')} at ${start.toFormat('h:mm a')}`;
  }
}
