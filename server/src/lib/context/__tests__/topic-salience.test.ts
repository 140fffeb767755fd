import { findMainTopic, isSalientTerm, stripSubjectPrefixes } from '../topic-salience';

describe('findMainTopic', () => {
  it('should grow the top term into a phrase from the body', () => {
    expect(findMainTopic('Q4 Report - When ready?', "when can you send me the Q4 report? I need it for tomorrow's meeting."))
      .toBe('Q4 report');
  });

  it('should weight subject terms above body terms', () => {
    expect(findMainTopic('Budget', 'The venue looks fine.')).toBe('Budget');
  });

  it('should return an empty string when nothing is salient', () => {
    expect(findMainTopic('Question', 'Just checking in on things.')).toBe('');
  });
});

describe('topic helpers', () => {
  it('should strip reply and forward prefixes', () => {
    expect(stripSubjectPrefixes('RE: Fwd: Launch plan')).toBe('Launch plan');
  });

  it('should ignore numbers and stop words', () => {
    expect(isSalientTerm('2024')).toBe(false);
    expect(isSalientTerm('the')).toBe(false);
    expect(isSalientTerm('invoice')).toBe(true);
  });
});
