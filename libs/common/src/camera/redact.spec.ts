import { redactTokens } from './redact';

describe('redactTokens', () => {
  it('hides every token value and keeps the rest of the URL', () => {
    expect(redactTokens('https://edge.example.net/cam.m3u8?token=abc123&quality=hd')).toBe(
      'https://edge.example.net/cam.m3u8?token=<redacted>&quality=hd',
    );
  });

  it('handles several tokens in one message', () => {
    expect(redactTokens("a token=one b 'token=two'")).toBe("a token=<redacted> b 'token=<redacted>'");
  });

  it('leaves token-free text alone', () => {
    expect(redactTokens('ffmpeg failed: connection refused')).toBe('ffmpeg failed: connection refused');
  });
});
