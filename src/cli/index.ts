import { Command } from "commander";
import { healthCommand } from "./health";
import { raceCommand } from "./race";
import { ttsCommand } from "./tts";

const program = new Command();

program
	.name("batch-race")
	.description("Race LLM batch APIs and speech synthesis vendors against each other")
	.version("1.0.0");

program.addCommand(raceCommand, { isDefault: true });
program.addCommand(ttsCommand);
program.addCommand(healthCommand);

export { program };
