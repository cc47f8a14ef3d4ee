/**
 * Chain splitting tests
 */

import { joinChain, splitChain } from '../chain';

describe('splitChain', () => {
  it('splits on && and trims each segment', () => {
    expect(splitChain('git pull &&npm ci&&  npm test ')).toEqual(['git pull', 'npm ci', 'npm test']);
  });

  it('keeps && inside quotes', () => {
    expect(splitChain(`echo "a && b" && echo 'c && d'`)).toEqual([`echo "a && b"`, `echo 'c && d'`]);
  });

  it('keeps an escaped ampersand', () => {
    expect(splitChain('echo a \\&& echo b')).toEqual(['echo a \\&& echo b']);
  });

  it('leaves single & and || alone', () => {
    expect(splitChain('sleep 1 & wait || true')).toEqual(['sleep 1 & wait || true']);
  });

  it('drops empty segments', () => {
    expect(splitChain('&& ls &&  && pwd &&')).toEqual(['ls', 'pwd']);
  });
});

describe('joinChain', () => {
  it('joins with a spaced operator', () => {
    expect(joinChain(['cd app', 'make'])).toBe('cd app && make');
  });
});
