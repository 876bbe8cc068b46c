import prompts from "prompts";
import type { PromptService } from "../ports/prompt.js";

async function ask(type: "text" | "password", message: string): Promise<string | undefined> {
  const { value } = await prompts({ type, name: "value", message });
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

export const interactivePrompts: PromptService = {
  text: (message) => ask("text", message),
  password: (message) => ask("password", message),
};
