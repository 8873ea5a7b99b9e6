/**
 * Creator persona tools
 * Requirement gathering, confirmation, synthesis and the way into the demo
 */

import { z } from "zod";
import { defineTool, type PersonaTool } from "./registry.js";
import type { PersonaToolContext } from "./types.js";
import { LockedError, NotReadyError } from "../utils/errors.js";

export function createCreatorTools(context: PersonaToolContext): PersonaTool[] {
  const { orchestrator, tasks } = context;

  const storeUserRequirement = defineTool({
    name: "store_user_requirement",
    description:
      "Store one detail the user gave about their business or the agent they want (name, type, functions, tone, audience, hours, contact, anything else)",
    audience: "creator",
    parameters: z.object({
      field: z.string().min(1).describe("What the value describes, e.g. business_name or tone"),
      value: z.string().describe("The user's answer"),
    }),
    async execute({ field, value }) {
      const stored = await orchestrator.storeRequirement(field, value);
      return `Got it! Noted ${field}: ${stored.value}`;
    },
  });

  const checkRequirementsStatus = defineTool({
    name: "check_requirements_status",
    description: "Check which requirements have been gathered and which are still needed",
    audience: "creator",
    parameters: z.object({}),
    async execute() {
      const { required, recommended } = orchestrator.getMissingRequirements();
      if (required.length > 0) {
        return `I still need these details: ${required.join(", ")}. Let's get those first.`;
      }
      if (recommended.length > 0) {
        return `I have the essentials! Your agent would be even better if you told me about: ${recommended.join(", ")}. Otherwise I can go with sensible defaults.`;
      }
      return "I have everything I need! Let me read back a summary so you can confirm it.";
    },
  });

  const showRequirementsSummary = defineTool({
    name: "show_requirements_summary",
    description: "Read back everything gathered so far",
    audience: "creator",
    parameters: z.object({}),
    async execute() {
      return `Here's what I have so far:\n\n${orchestrator.getSummary()}`;
    },
  });

  const confirmRequirements = defineTool({
    name: "confirm_requirements",
    description: "Present the summary for confirmation once the required details are in",
    audience: "creator",
    parameters: z.object({}),
    async execute() {
      const summary = await orchestrator.confirmRequirements();
      return `Here's what I've gathered:\n\n${summary}\n\nDoes this look right? Shall I go ahead and create your agent?`;
    },
  });

  const finalizeRequirements = defineTool({
    name: "finalize_requirements",
    description: "Start building the agent. Only call after the user has confirmed the summary",
    audience: "creator",
    parameters: z.object({}),
    async execute() {
      await orchestrator.finalizeRequirements();
      return "Perfect, everything is confirmed. Give me a few moments to create your custom voice agent...";
    },
  });

  const startDemo = defineTool({
    name: "start_demo",
    description: "Connect the user to their newly built demo agent",
    audience: "creator",
    parameters: z.object({}),
    async execute() {
      if (!orchestrator.canStartDemo(false)) {
        throw notReady(orchestrator.getState());
      }
      tasks.run("start_demo", () => orchestrator.startDemo());
      return "Great! Let me connect you to your demo agent now...";
    },
  });

  const tryDemoAgain = defineTool({
    name: "try_demo_again",
    description: "Let the user talk to their demo agent again after giving feedback",
    audience: "creator",
    parameters: z.object({}),
    async execute() {
      if (!orchestrator.canStartDemo(true)) {
        throw new NotReadyError(
          orchestrator.getState(),
          "Let me first finish creating your demo agent, then you can try it.",
        );
      }
      tasks.run("try_demo_again", () => orchestrator.tryDemoAgain());
      return "Perfect! Connecting you to your demo agent again...";
    },
  });

  const askDemoPreference = defineTool({
    name: "ask_demo_preference",
    description: "Ask whether the user wants to try the demo or is happy with their agent",
    audience: "creator",
    parameters: z.object({}),
    async execute() {
      if (orchestrator.isDemoCompleted()) {
        return "Would you like to try the demo again, or are you happy with your agent? If you're all set, I can close our session for you.";
      }
      if (orchestrator.getState() !== "demo_ready") {
        throw notReady(orchestrator.getState());
      }
      return "Your agent is ready! Would you like to try the demo now, or do you have any questions first?";
    },
  });

  const checkProcessingStatus = defineTool({
    name: "check_processing_status",
    description: "Report how far along the agent build is",
    audience: "creator",
    parameters: z.object({}),
    async execute() {
      switch (orchestrator.getState()) {
        case "processing":
          return "I'm still working on your agent. It should be ready in just a few more moments!";
        case "demo_ready":
          return "Great news! Your agent is ready to test. Would you like to try it out now?";
        case "demo_active":
          return "You're testing your demo agent right now. When you're done, just ask to speak with me again!";
        case "confirming":
          return "I have your requirements ready. Shall I go ahead and create your agent?";
        case "completed":
          return "Our session has already ended.";
        case "gathering":
          return "Let's gather the details I need to build your agent!";
      }
    },
  });

  const handleChangeRequest = defineTool({
    name: "handle_change_request_during_processing",
    description: "Respond when the user wants to change something they already told you",
    audience: "creator",
    parameters: z.object({
      change: z.string().optional().describe("What the user wants to change"),
    }),
    async execute({ change }) {
      if (orchestrator.getState() === "processing") {
        throw new LockedError(change === undefined ? {} : { change });
      }
      return "Sure, what would you like to change?";
    },
  });

  const closeSession = defineTool({
    name: "close_session",
    description: "End the conversation, optionally with the user's 1-5 rating",
    audience: "creator",
    parameters: z.object({
      rating: z.number().int().min(1).max(5).optional().describe("User satisfaction, 1 to 5"),
    }),
    async execute({ rating }) {
      await orchestrator.closeSession(rating);
      const businessName = orchestrator.getSpec()?.businessContext.businessName;
      if (businessName && orchestrator.getSavedAgentId() !== null) {
        return `Thank you for creating your voice agent for ${businessName} with us! Your agent has been saved, so come back anytime to test it or make changes. Have a wonderful day!`;
      }
      if (businessName) {
        return `Thank you for creating your voice agent for ${businessName} with us! Come back anytime you'd like to build it again. Have a wonderful day!`;
      }
      return "Thank you for stopping by! Come back anytime you're ready to create your voice agent. Have a great day!";
    },
  });

  const loadSavedAgent = defineTool({
    name: "load_saved_agent",
    description: "Load an agent the user built in an earlier session by its reference",
    audience: "creator",
    parameters: z.object({
      agentId: z.string().min(1).describe("Reference of the saved agent"),
    }),
    async execute({ agentId }) {
      const spec = await orchestrator.loadSavedAgent(agentId);
      const businessName = spec.businessContext.businessName ?? "your business";
      return `I found your ${spec.agentType} for ${businessName}. Would you like to try it out?`;
    },
  });

  return [
    storeUserRequirement,
    checkRequirementsStatus,
    showRequirementsSummary,
    confirmRequirements,
    finalizeRequirements,
    startDemo,
    tryDemoAgain,
    askDemoPreference,
    checkProcessingStatus,
    handleChangeRequest,
    closeSession,
    loadSavedAgent,
  ];
}

function notReady(state: string): NotReadyError {
  if (state === "processing") {
    return new NotReadyError(state, "I'm still creating your agent. Just a few more seconds!");
  }
  return new NotReadyError(state);
}
