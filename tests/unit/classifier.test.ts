import { MessageClassifierService } from '../../src/services/classifier.service';

describe('MessageClassifierService', () => {
  const classifier = new MessageClassifierService();

  it('should classify greetings', () => {
    expect(classifier.classify('Hello there')).toBe('greeting');
    expect(classifier.classify('Good morning!')).toBe('greeting');
  });

  it('should classify appointment requests', () => {
    expect(classifier.classify('Hi, I need to schedule a plumbing appointment')).toBe('appointment_request');
    expect(classifier.classify('Can you come out Tuesday?')).toBe('appointment_request');
  });

  it('should classify quote requests', () => {
    expect(classifier.classify('How much will this cost?')).toBe('quote_request');
    expect(classifier.classify('Can I get an estimate')).toBe('quote_request');
  });

  it('should classify confirmations', () => {
    expect(classifier.classify('Tomorrow at 2pm works')).toBe('confirmation');
    expect(classifier.classify('Yes, confirmed')).toBe('confirmation');
  });

  it('should classify emergencies ahead of every other type', () => {
    expect(classifier.classify('EMERGENCY! My basement is flooding!')).toBe('emergency');
    expect(classifier.classify('I need an appointment ASAP')).toBe('emergency');
    expect(classifier.classify('There is smoke coming from the outlet')).toBe('emergency');
  });

  it('should not treat routine safety jobs as emergencies', () => {
    expect(classifier.classify('Can you install a smoke detector in the hallway?')).toBe('question');
    expect(classifier.classify('I need a flood light put up over the garage')).toBe('other');
    expect(classifier.classify('Could you replace the fire alarm batteries next week?')).toBe('question');
    expect(classifier.classify('There is no power outlet in the garage, can you add one?')).toBe('question');
  });

  it('should classify emergency phrases', () => {
    expect(classifier.classify('The dryer caught fire')).toBe('emergency');
    expect(classifier.classify('Our power went out and the breaker is hot')).toBe('emergency');
    expect(classifier.classify('I smell gas in the kitchen')).toBe('emergency');
  });

  it('should classify questions by question mark or question word', () => {
    expect(classifier.classify('Do you work weekends?')).toBe('question');
    expect(classifier.classify('What brands do you carry')).toBe('question');
  });

  it('should fall back to other', () => {
    expect(classifier.classify('Thanks')).toBe('other');
    expect(classifier.classify('')).toBe('other');
    expect(classifier.classify('   ')).toBe('other');
    expect(classifier.classify(null)).toBe('other');
  });

  it('should only match whole words', () => {
    // "hi" inside "this", "fire" inside "fireplace"
    expect(classifier.classify('this is the address')).toBe('other');
    expect(classifier.classify('The fireplace looks nice')).toBe('other');
  });

  it('should detect emergencies case-insensitively', () => {
    expect(classifier.isEmergency('We have a GAS LEAK')).toBe(true);
    expect(classifier.isEmergency('The faucet drips a little')).toBe(false);
    expect(classifier.isEmergency(undefined)).toBe(false);
  });
});
