jest.mock('../../src/config/env', () => ({
  env: {
    PORT: '3000',
    NODE_ENV: 'test',
    API_KEYS: 'test-api-key',
    TWILIO_AUTH_TOKEN: 'test-secret',
    WEBHOOK_BASE_URL: 'http://localhost:3000',
    BUSINESS_TIMEZONE: 'America/New_York',
  },
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('@sentry/node', () => ({
  init: jest.fn(),
  setupExpressErrorHandler: jest.fn(),
}));

import request from 'supertest';
import { Express } from 'express';
import { env } from '../../src/config/env';
import { createApp } from '../../src/app';
import { ConversationManager } from '../../src/services/conversation.service';
import { ResponseService } from '../../src/services/response.service';
import { ConversationStore } from '../../src/services/store/conversation.store';
import { InMemoryConversationStore } from '../../src/services/store/memory.store';
import { BusinessHoursConfig } from '../../src/utils/businessHours';
import { StoreError } from '../../src/utils/errors';
import { logger } from '../../src/utils/logger';

const PHONE = '+17575551234';

const ALWAYS_OPEN = { open: '00:00', close: '24:00' };
const ALWAYS_OPEN_HOURS: BusinessHoursConfig = {
  monday: ALWAYS_OPEN,
  tuesday: ALWAYS_OPEN,
  wednesday: ALWAYS_OPEN,
  thursday: ALWAYS_OPEN,
  friday: ALWAYS_OPEN,
  saturday: ALWAYS_OPEN,
  sunday: ALWAYS_OPEN,
};

function buildApp(store: ConversationStore): { app: Express; manager: ConversationManager } {
  const manager = new ConversationManager({ store });
  const responder = new ResponseService({ timezone: 'America/New_York', businessHours: ALWAYS_OPEN_HOURS });
  return { app: createApp({ manager, responder }), manager };
}

describe('POST /webhook/sms', () => {
  let store: InMemoryConversationStore;
  let app: Express;
  let manager: ConversationManager;

  beforeEach(() => {
    store = new InMemoryConversationStore();
    ({ app, manager } = buildApp(store));
  });

  it('should record the message and reply with TwiML', async () => {
    const res = await request(app)
      .post('/webhook/sms')
      .type('form')
      .send({ From: PHONE, Body: 'Hi, I need to schedule a plumbing appointment', MessageSid: 'SM0001' });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/text\/xml/);
    expect(res.text).toContain(
      '<Response><Message>Happy to get your plumbing job on the calendar. What day and time suit you best?</Message></Response>'
    );

    const thread = await store.load(PHONE);
    expect(thread?.state).toBe('scheduling');
    expect(thread?.messages.map((m) => m.direction)).toEqual(['inbound', 'outbound']);
    expect(thread?.messages[0].message_id).toBe('SM0001');
    expect(thread?.messages[0].metadata).toEqual({ channel: 'sms', provider: 'twilio' });
    expect(thread?.messages[1].metadata).toEqual({ channel: 'sms', provider: 'twilio', template: 'scheduling' });
  });

  it('should not reply twice to a redelivered message', async () => {
    const payload = { From: PHONE, Body: 'Hello', MessageSid: 'SM0002' };
    await request(app).post('/webhook/sms').type('form').send(payload);
    const res = await request(app).post('/webhook/sms').type('form').send(payload);

    expect(res.status).toBe(200);
    expect(res.text).not.toContain('<Message>');
    expect((await store.load(PHONE))?.messages).toHaveLength(2);
  });

  it('should flag emergencies for a human', async () => {
    const res = await request(app)
      .post('/webhook/sms')
      .type('form')
      .send({ From: PHONE, Body: 'EMERGENCY! My basement is flooding!', MessageSid: 'SM0003' });

    expect(res.status).toBe(200);

    const summary = await manager.getContext(PHONE);
    expect(summary.state).toBe('complete');
    expect(summary.requires_human).toBe(true);
    expect((await store.load(PHONE))?.messages[1].metadata.template).toBe('emergency');
  });

  it('should reject a request without a sender', async () => {
    const res = await request(app).post('/webhook/sms').type('form').send({ Body: 'Hello' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Missing From' });
  });

  it('should reject a sender that is not a phone number', async () => {
    const res = await request(app).post('/webhook/sms').type('form').send({ From: 'abc', Body: 'Hello' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid phone number: abc' });
  });

  it('should still answer Twilio when storage fails', async () => {
    const failing: ConversationStore = {
      storageType: 'redis',
      load: async () => {
        throw new StoreError('load', PHONE, new Error('connection lost'));
      },
      save: async () => undefined,
      delete: async () => false,
      listActive: async () => [],
      healthCheck: async () => ({ status: 'unhealthy', error: 'connection lost' }),
      close: async () => undefined,
    };
    const { app: failingApp } = buildApp(failing);

    const res = await request(failingApp).post('/webhook/sms').type('form').send({ From: PHONE, Body: 'Hello' });

    expect(res.status).toBe(200);
    expect(res.text).toContain('<Message>Thanks for your message!');
    expect(logger.error).toHaveBeenCalledWith('SMS processing incomplete', {
      from: PHONE,
      error: 'ConversationStore.load failed: connection lost',
    });
  });

  describe('outside development', () => {
    beforeEach(() => {
      env.NODE_ENV = 'production';
    });

    afterEach(() => {
      env.NODE_ENV = 'test';
    });

    it('should require a Twilio signature', async () => {
      const res = await request(app).post('/webhook/sms').type('form').send({ From: PHONE, Body: 'Hello' });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: 'Missing signature' });
      expect(await store.load(PHONE)).toBeNull();
    });

    it('should reject a bad Twilio signature', async () => {
      const res = await request(app)
        .post('/webhook/sms')
        .set('x-twilio-signature', 'not-a-signature')
        .type('form')
        .send({ From: PHONE, Body: 'Hello' });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: 'Invalid signature' });
    });
  });
});
