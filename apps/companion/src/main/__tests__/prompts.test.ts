import { describe, expect, it } from "vitest";
import { buildChatSystemPrompt, buildCompletionMessages } from "../agent/prompts";

const persona = { name: "Doge", maxWords: 25 };

describe("buildChatSystemPrompt", () => {
  it("names the persona, the word limit and the mood tags", () => {
    expect(buildChatSystemPrompt(persona)).toBe(
      "You are Doge. Answer very briefly (≤25 words) and append one mood tag <mood:HAPPY|LAUGH|WOW|SAD|THINK>."
    );
  });
});

describe("buildCompletionMessages", () => {
  it("orders system, live data, web snippet, then history", () => {
    const messages = buildCompletionMessages({
      persona,
      priceSnippet: "Dogecoin price: $0.1000 USD.",
      priceIntent: true,
      searchSnippet: "Dogecoin is a cryptocurrency.",
      history: [
        { role: "user", content: "hi" },
        { role: "assistant", content: "wow" },
        { role: "user", content: "dogecoin price?" }
      ]
    });

    expect(messages.map((m) => m.role)).toEqual(["system", "user", "user", "user", "assistant", "user"]);
    expect(messages[1]?.content).toBe("(live-data) Dogecoin price: $0.1000 USD.\nYou MUST quote that number.");
    expect(messages[2]?.content).toBe("(web) Dogecoin is a cryptocurrency.");
    expect(messages[5]?.content).toBe("dogecoin price?");
  });

  it("softens the price instruction without an explicit price question", () => {
    const messages = buildCompletionMessages({
      persona,
      priceSnippet: "Dogecoin price: $0.1000 USD.",
      priceIntent: false,
      searchSnippet: "",
      history: []
    });

    expect(messages).toHaveLength(2);
    expect(messages[1]?.content).toBe(
      "(live-data) Dogecoin price: $0.1000 USD.\nUse the number only if the user asked for price/market info."
    );
  });

  it("omits empty enrichment", () => {
    const messages = buildCompletionMessages({
      persona,
      priceSnippet: "",
      priceIntent: true,
      searchSnippet: "",
      history: [{ role: "user", content: "hello" }]
    });
    expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
  });
});
