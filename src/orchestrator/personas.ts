/**
 * Personas and the fixed utterances spoken around handoffs
 */

import type { AgentSpec } from "../catalog/types.js";
import type { CreatorConfig } from "../config/schema.js";
import type { Persona } from "../session/types.js";

export function creatorPersona(creator: CreatorConfig): Persona {
  return { name: creator.name, instructions: creator.instructions, voice: creator.voice };
}

export function demoPersona(spec: AgentSpec): Persona {
  return { name: spec.agentType, instructions: spec.instructions, voice: spec.voice };
}

function businessNameOf(spec: AgentSpec): string {
  return spec.businessContext.businessName ?? "your business";
}

export function greeting(creatorName: string): string {
  return `Hi! I'm ${creatorName}. I help businesses create their own custom voice agents. What's the name of your business, and what kind of business is it?`;
}

export function readyAnnouncement(spec: AgentSpec): string {
  return `Fantastic! Your ${spec.agentType} is now ready to test! I've configured it with all the features you requested. Would you like to try it out right now?`;
}

export const SYNTHESIS_APOLOGY =
  "I'm sorry, I ran into a problem putting your agent together. Let's go over the details once more and try again.";

export const HANDOFF_APOLOGY =
  "Sorry about that, I couldn't connect you just now. I'm back with you, and we can try the demo again whenever you're ready.";

export function farewellToDemo(spec: AgentSpec, creatorName: string): string {
  return `Perfect! I'm now connecting you to your ${spec.agentType}. When you're done testing, just ask to speak with ${creatorName} again. Here we go!`;
}

export function demoIntroduction(spec: AgentSpec, creatorName: string): string {
  return `Hello! I'm your new ${spec.agentType} for ${businessNameOf(spec)}. Try out my features, and when you're ready to go back to ${creatorName} for feedback, just let me know. How can I assist you today?`;
}

export function farewellToCreator(creatorName: string): string {
  return `Thank you for testing me out! I'm now connecting you back to ${creatorName} who can help with any changes or next steps.`;
}

export function creatorReturn(creatorName: string, spec: AgentSpec): string {
  const type = spec.businessContext.businessType ?? spec.businessContext.category;
  return `Hi again! I'm ${creatorName}, back to help you. How did the demo of your ${type} agent for ${businessNameOf(spec)} go? Would you like to adjust the tone, functions or anything else, or shall we wrap up?`;
}
