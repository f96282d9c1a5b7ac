import { ComposeInput, ResponseService } from '../../src/services/response.service';
import { MessageClassifierService } from '../../src/services/classifier.service';
import { ContextSummary } from '../../src/types/conversation';

// Wednesday 10:00 and 18:30 in New York
const OPEN = new Date('2026-03-04T15:00:00.000Z');
const CLOSED = new Date('2026-03-04T23:30:00.000Z');
// Saturday 10:00 in New York
const WEEKEND = new Date('2026-03-07T15:00:00.000Z');

function makeSummary(overrides: Partial<ContextSummary> = {}): ContextSummary {
  return {
    has_conversation: true,
    state: 'gathering_info',
    message_count: 2,
    recent_messages: [],
    conversation_summary: '',
    context: {},
    customer_info: {},
    requires_human: false,
    ...overrides,
  };
}

describe('ResponseService', () => {
  const responder = new ResponseService({ timezone: 'America/New_York' });

  it('should answer emergencies first, even after hours', () => {
    const reply = responder.compose({
      summary: makeSummary({ state: 'complete', requires_human: true, customer_info: { name: 'Jane' } }),
      messageType: 'emergency',
      now: CLOSED,
    });

    expect(reply).toEqual({
      template: 'emergency',
      text: "Jane, we've flagged your message as a priority and a team member will call you back within 15 minutes. If anyone is in danger, call 911.",
    });
  });

  it('should tell the customer when the office reopens', () => {
    const reply = responder.compose({
      summary: makeSummary({ customer_info: { name: 'Jane' } }),
      messageType: 'question',
      now: CLOSED,
    });

    expect(reply).toEqual({
      template: 'after_hours',
      text: "Thanks for reaching out, Jane! Our office is closed at the moment. We'll reply Thursday at 8:00 AM.",
    });
  });

  it('should skip the weekend when naming the next opening', () => {
    const reply = responder.compose({ summary: makeSummary(), messageType: 'greeting', now: WEEKEND });
    expect(reply.text).toBe("Thanks for reaching out! Our office is closed at the moment. We'll reply Monday at 8:00 AM.");
  });

  it('should ask for a time while scheduling', () => {
    const reply = responder.compose({
      summary: makeSummary({ state: 'scheduling', context: { service_type: 'plumbing' } }),
      messageType: 'appointment_request',
      now: OPEN,
    });

    expect(reply).toEqual({
      template: 'scheduling',
      text: 'Happy to get your plumbing job on the calendar. What day and time suit you best?',
    });
  });

  it('should read back the chosen time while confirming', () => {
    const reply = responder.compose({
      summary: makeSummary({
        state: 'confirming',
        context: { preferred_day: 'tomorrow', preferred_time: 'afternoon' },
        customer_info: { name: 'Jane' },
      }),
      messageType: 'confirmation',
      now: OPEN,
    });

    expect(reply).toEqual({
      template: 'confirming',
      text: 'Thanks, Jane! We have you down for tomorrow afternoon. A technician will text before arriving. Reply CHANGE if you need a different time.',
    });
  });

  it('should fall back to a generic time when none was given', () => {
    const reply = responder.compose({ summary: makeSummary({ state: 'confirming' }), messageType: 'confirmation', now: OPEN });
    expect(reply.text).toBe(
      'Thanks! We have you down for the time you picked. A technician will text before arriving. Reply CHANGE if you need a different time.'
    );
  });

  it('should wrap up a completed conversation', () => {
    const reply = responder.compose({ summary: makeSummary({ state: 'complete' }), messageType: 'confirmation', now: OPEN });
    expect(reply).toEqual({
      template: 'complete',
      text: "Thanks, you're all set. Text us anytime if anything else comes up.",
    });
  });

  it('should follow up on quote requests', () => {
    const reply = responder.compose({ summary: makeSummary(), messageType: 'quote_request', now: OPEN });
    expect(reply).toEqual({
      template: 'quote',
      text: 'Pricing depends on the job. Could you send a short description or a photo of the work so we can give you a number?',
    });
  });

  it('should welcome a first-time texter', () => {
    const reply = responder.compose({ summary: makeSummary({ message_count: 1 }), messageType: 'other', now: OPEN });
    expect(reply).toEqual({
      template: 'welcome',
      text: 'Thanks for reaching out! This is Karen. What can we help you with around the house?',
    });
  });

  it('should ask for details otherwise', () => {
    const reply = responder.compose({ summary: makeSummary({ message_count: 3 }), messageType: 'other', now: OPEN });
    expect(reply).toEqual({
      template: 'details',
      text: 'Got it. Could you share a few more details about the job and the address?',
    });
  });

  it('should word replies so they never trigger a state change', () => {
    const classifier = new MessageClassifierService();
    const cases: ComposeInput[] = [
      { summary: makeSummary({ requires_human: true }), messageType: 'other', now: OPEN },
      { summary: makeSummary(), messageType: 'other', now: CLOSED },
      { summary: makeSummary({ state: 'complete' }), messageType: 'confirmation', now: OPEN },
      { summary: makeSummary({ state: 'confirming' }), messageType: 'confirmation', now: OPEN },
      { summary: makeSummary({ state: 'scheduling' }), messageType: 'appointment_request', now: OPEN },
      { summary: makeSummary(), messageType: 'quote_request', now: OPEN },
      { summary: makeSummary(), messageType: 'greeting', now: OPEN },
      { summary: makeSummary({ message_count: 3 }), messageType: 'other', now: OPEN },
    ];

    for (const input of cases) {
      const type = classifier.classify(responder.compose(input).text);
      expect(['appointment_request', 'confirmation', 'emergency']).not.toContain(type);
    }
  });
});
