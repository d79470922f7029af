import { describe, it, expect } from 'vitest';
import { ConversationLog } from '../conversation-log.js';

describe('ConversationLog', () => {
  it('keeps entries in append order', () => {
    const log = new ConversationLog();

    log.system('rules');
    log.user("Request: 'hi'");
    log.assistantCall('look up', { id: 'step_1', type: 'function', function: { name: 'ListWikiPages', arguments: '{}' } });
    log.toolResult('step_1', 'DONE: {}');

    expect(log.entries()).toEqual([
      { role: 'system', content: 'rules' },
      { role: 'user', content: "Request: 'hi'" },
      {
        role: 'assistant',
        content: 'look up',
        tool_calls: [{ id: 'step_1', type: 'function', function: { name: 'ListWikiPages', arguments: '{}' } }],
      },
      { role: 'tool', content: 'DONE: {}', tool_call_id: 'step_1' },
    ]);
    expect(log.length).toBe(4);
  });

  it('hands out copies that cannot change the log', () => {
    const log = new ConversationLog();
    log.assistantCall('x', { id: 'step_1', type: 'function', function: { name: 'GetProject', arguments: '{}' } });

    const [entry] = log.entries();
    entry.content = 'changed';
    const call = entry.tool_calls?.[0];
    if (call) {
      call.function.name = 'Other';
    }

    expect(log.entries()[0]).toMatchObject({
      content: 'x',
      tool_calls: [{ function: { name: 'GetProject' } }],
    });
  });
});
