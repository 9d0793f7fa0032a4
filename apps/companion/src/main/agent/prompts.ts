import { MOOD_TAGS } from "@deskdoge/shared";
import type { ChatMessage, CompletionMessage } from "@deskdoge/shared";
import type { PersonaConfig } from "../protocol/types";

export function buildChatSystemPrompt(persona: PersonaConfig) {
  const words = Math.max(1, Math.floor(persona.maxWords));
  return (
    `You are ${persona.name}. Answer very briefly (≤${words} words) and append one mood tag ` +
    `<mood:${MOOD_TAGS.join("|")}>.`
  );
}

export function buildLiveDataMessage(priceSnippet: string, priceIntent: boolean): CompletionMessage {
  const instruction = priceIntent
    ? "You MUST quote that number."
    : "Use the number only if the user asked for price/market info.";
  return { role: "user", content: `(live-data) ${priceSnippet}\n${instruction}` };
}

export function buildWebSnippetMessage(snippet: string): CompletionMessage {
  return { role: "user", content: `(web) ${snippet}` };
}

export function buildCompletionMessages(opts: {
  persona: PersonaConfig;
  priceSnippet: string;
  priceIntent: boolean;
  searchSnippet: string;
  history: ChatMessage[];
}): CompletionMessage[] {
  const messages: CompletionMessage[] = [{ role: "system", content: buildChatSystemPrompt(opts.persona) }];
  if (opts.priceSnippet) messages.push(buildLiveDataMessage(opts.priceSnippet, opts.priceIntent));
  if (opts.searchSnippet) messages.push(buildWebSnippetMessage(opts.searchSnippet));
  for (const m of opts.history) messages.push({ role: m.role, content: m.content });
  return messages;
}
