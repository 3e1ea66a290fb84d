import { ChatTurn, PromptShape, ResponseValue } from '../../core/entities/PromptRecord.js';

export type ChatSender = (messages: ChatTurn[]) => Promise<string>;

/**
 * Send a scripted conversation one user turn at a time,
 * feeding every reply back into the history. Returns the replies in order.
 */
export async function runScriptedConversation(turns: ChatTurn[], send: ChatSender): Promise<string[]> {
  const history: ChatTurn[] = [];
  const replies: string[] = [];
  for (const turn of turns) {
    history.push(turn);
    const reply = await send([...history]);
    history.push({ role: 'assistant', content: reply });
    replies.push(reply);
  }
  return replies;
}

/**
 * Dispatch a text or turn-list prompt through one chat endpoint.
 * Plain text becomes a single user turn.
 */
export async function sendChatPrompt(shape: PromptShape, send: ChatSender): Promise<ResponseValue> {
  switch (shape.kind) {
    case 'plain-text':
      return send([{ role: 'user', content: shape.text }]);
    case 'turn-list':
      return shape.scripted ? runScriptedConversation(shape.turns, send) : send(shape.turns);
    case 'multimodal-parts':
      throw new Error('multimodal prompts are not supported by this endpoint');
  }
}
