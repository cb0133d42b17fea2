import { PromptTemplate } from "@langchain/core/prompts";
import { FailedOutcome, describeOutcome } from "./types.js";

/**
 * Rule sections, in the order they appear in prompts
 */
export const SECTION_TITLES = [
  "Overview",
  "Game Objective",
  "Game Setup",
  "How to Play",
  "Winning the Game",
  "Game Strategy",
  "End of Game",
] as const;

export type SectionTitle = (typeof SECTION_TITLES)[number];

export const SECTION_DESCRIPTIONS: Record<SectionTitle, string> = {
  Overview:
    "A short description of the game, its purpose, and how it is played. It introduces players to the game concept.",
  "Game Objective": "Defines what players need to do to win or achieve the highest score.",
  "Game Setup":
    "Instructions on how to prepare the game before starting, including components, board setup, and player roles.",
  "How to Play":
    "Detailed instructions on the flow of the game, player actions, and turn sequence. This section can scale depending on the complexity of the game.",
  "Winning the Game": "Defines the conditions needed to win the game.",
  "Game Strategy": "Offers strategic advice and tips for improving the chances of winning.",
  "End of Game": "Explains how and when the game concludes.",
};

export type GameMetadata = Record<string, string>;

const NOT_AVAILABLE = "Not available";

const codePromptTemplate = PromptTemplate.fromTemplate(
  `You are a JavaScript expert and you are tasked with generating the code for a game. Here are the components of the game:

{sections}

Based on the above information, write the complete Node.js program for this game as a single self-contained CommonJS file.
The game must be playable in a terminal: read player moves line by line from standard input and print the game state to standard output.
Use only built-in Node.js modules. When standard input ends, the program must exit cleanly with exit code 0.
Respond with the code only, in one javascript code block.`
);

const rulesPromptTemplate = PromptTemplate.fromTemplate(
  `You are a creative game designer. You need to design a new game called "{gameName}".

Please create detailed game rules for this new game. Include the following sections:

{sections}

Once the rules are established, make sure they are precise enough to implement the game as a terminal program. Do not write code, only the rules based on the above sections. Be creative and come up with a fun, interactive game idea.`
);

const repairPromptTemplate = PromptTemplate.fromTemplate(
  `{rulesPrompt}

The previous program you wrote for this game failed validation.

{failure}

Write a corrected version of the complete program that fixes this problem. Respond with the code only, in one javascript code block.`
);

function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

/**
 * Look up a section's text, matching keys without regard to case or
 * surrounding whitespace.
 */
function sectionText(metadata: GameMetadata, title: SectionTitle): string {
  const wanted = normalizeTitle(title);
  for (const [key, value] of Object.entries(metadata)) {
    if (normalizeTitle(key) === wanted && value.trim() !== "") {
      return value.trim();
    }
  }
  return NOT_AVAILABLE;
}

export async function buildCodePrompt(metadata: GameMetadata, gameName?: string): Promise<string> {
  const lines = SECTION_TITLES.map((title) => `${title}: ${sectionText(metadata, title)}`);
  if (gameName !== undefined && gameName.trim() !== "") {
    lines.unshift(`Game Name: ${gameName.trim()}`);
  }
  return codePromptTemplate.format({ sections: lines.join("\n") });
}

export async function buildRulesPrompt(gameName: string): Promise<string> {
  const sections = SECTION_TITLES.map(
    (title, idx) => `${idx + 1}. ${title}: ${SECTION_DESCRIPTIONS[title]}`
  ).join("\n");
  return rulesPromptTemplate.format({ gameName: gameName.trim(), sections });
}

function describeFailure(outcome: FailedOutcome): string {
  const lines = [`Error: ${describeOutcome(outcome)}`];
  switch (outcome.kind) {
    case "syntax_error":
      if (outcome.snippet) {
        lines.push(`Code around the error:\n${outcome.snippet}`);
      }
      break;
    case "runtime_error":
      if (outcome.trace) {
        lines.push(`Stack trace:\n${outcome.trace}`);
      }
      if (outcome.output) {
        lines.push(`Program output before the failure:\n${outcome.output}`);
      }
      break;
    case "provider_error":
      lines.push("No program was received for the previous attempt. Make sure to answer with a complete program.");
      break;
  }
  return lines.join("\n\n");
}

/**
 * The rules prompt followed by the last failure's detail and a request for a
 * corrected program.
 */
export async function buildRepairPrompt(rulesPrompt: string, outcome: FailedOutcome): Promise<string> {
  return repairPromptTemplate.format({ rulesPrompt, failure: describeFailure(outcome) });
}
