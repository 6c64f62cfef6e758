import type OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | ChatContentPart[] };

/** Sends a chat request in JSON mode and resolves with the raw reply text. */
export type JsonCompletion = (messages: ChatMessage[]) => Promise<string>;

export function createOpenAiJsonCompletion(
  client: OpenAI,
  model: string,
  temperature: number = 0.3,
): JsonCompletion {
  return async (messages) => {
    const params: ChatCompletionMessageParam[] = messages;
    const completion = await client.chat.completions.create({
      model,
      messages: params,
      temperature,
      response_format: { type: 'json_object' },
    });
    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new Error(`Empty completion from ${model}`);
    }
    return content;
  };
}
