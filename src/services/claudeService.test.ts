import { describe, it, expect, vi } from 'vitest';
import { ClassifierError } from '../core/errors';
import { ClaudeService } from './claudeService';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create };
  }
}));

describe('ClaudeService', () => {
  it('sends both prompts and parses the JSON reply', async () => {
    create.mockResolvedValueOnce({
      content: [{ type: 'text', text: '```json\n{"action": "approve", "feedback": "ok"}\n```' }]
    });
    const claude = new ClaudeService('test-secret', { model: 'claude-test', maxTokens: 500 });

    await expect(claude.classify('SYSTEM', 'USER')).resolves.toEqual({ action: 'approve', feedback: 'ok' });
    expect(create).toHaveBeenCalledWith({
      model: 'claude-test',
      max_tokens: 500,
      system: 'SYSTEM\n\nRespond with a single JSON object only.',
      messages: [{ role: 'user', content: 'USER' }]
    });
  });

  it('wraps API failures', async () => {
    create.mockRejectedValueOnce(new Error('overloaded'));
    const claude = new ClaudeService('test-secret');

    await expect(claude.classify('SYSTEM', 'USER')).rejects.toBeInstanceOf(ClassifierError);
  });

  it('rejects replies without text', async () => {
    create.mockResolvedValueOnce({ content: [] });
    const claude = new ClaudeService('test-secret');

    await expect(claude.classify('SYSTEM', 'USER')).rejects.toThrow('Claude request failed');
  });
});
