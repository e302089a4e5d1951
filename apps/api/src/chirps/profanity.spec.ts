import { cleanProfanity } from './profanity';

describe('cleanProfanity', () => {
  it('should leave clean text untouched', () => {
    expect(cleanProfanity('I had something interesting for breakfast')).toBe(
      'I had something interesting for breakfast',
    );
  });

  it('should mask lower-case and capitalized words', () => {
    expect(
      cleanProfanity('I hear Mastodon is better than Chirpy. sharbert I need to migrate'),
    ).toBe('I hear Mastodon is better than Chirpy. **** I need to migrate');
    expect(cleanProfanity('Kerfuffle and Fornax')).toBe('**** and ****');
  });

  it('should leave other casings alone', () => {
    expect(cleanProfanity('SHARBERT fOrNaX')).toBe('SHARBERT fOrNaX');
  });

  it('should mask substrings and punctuation-adjacent words', () => {
    expect(cleanProfanity('a kerfuffle! a kerfuffles')).toBe('a ****! a ****s');
  });
});
