import { parseCorsOrigin } from './configure-app';

describe('parseCorsOrigin', () => {
  it('should allow every origin for *', () => {
    expect(parseCorsOrigin('*')).toBe(true);
  });

  it('should trim each entry of the allow list', () => {
    expect(parseCorsOrigin('https://a.example, https://b.example')).toEqual([
      'https://a.example',
      'https://b.example',
    ]);
  });

  it('should drop empty entries', () => {
    expect(parseCorsOrigin('https://a.example,,')).toEqual([
      'https://a.example',
    ]);
  });
});
