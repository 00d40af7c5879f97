import type { ChatMessage } from "../providers/types.js";
import type { Persona } from "./types.js";

export type PromptTemplate = "grounded" | "fallback";

function personaBlock(persona: Persona): string[] {
  return [
    "About the user:",
    `- Role: ${persona.role}`,
    `- Preferences: ${persona.preferences}`,
    `- Current activity: ${persona.activity}`
  ];
}

export function buildGroundedSystemPrompt(persona: Persona): string {
  return [
    "You are a helpful assistant answering questions using the retrieved knowledge base.",
    "",
    "Rules:",
    "- Ground every answer in the KNOWLEDGE section of the context.",
    "- If KNOWLEDGE lists several items (for example, several tickets), reason over each entry before answering.",
    "- When asked for tickets by status, list every matching ticket ID with its status and other relevant fields.",
    "- If the information is not present in KNOWLEDGE, say so explicitly.",
    "- HISTORY is the user's earlier conversation; use it for continuity, not as evidence.",
    "- Match the user's preferences for tone and length.",
    "",
    ...personaBlock(persona)
  ].join("\n");
}

export function buildFallbackSystemPrompt(persona: Persona): string {
  return [
    "You are a helpful assistant grounded in the user's persona details and prior chat history.",
    "",
    "No knowledge base matched this question. Answer from general knowledge, the persona and HISTORY.",
    "If the question needs facts you do not have, say what is missing instead of guessing.",
    "",
    ...personaBlock(persona)
  ].join("\n");
}

export function buildMessages(input: {
  template: PromptTemplate;
  persona: Persona;
  contextText: string;
  query: string;
}): ChatMessage[] {
  const system =
    input.template === "grounded" ? buildGroundedSystemPrompt(input.persona) : buildFallbackSystemPrompt(input.persona);
  return [
    { role: "system", content: system },
    { role: "user", content: `Context:\n${input.contextText}\n\nQuestion:\n${input.query}` }
  ];
}
