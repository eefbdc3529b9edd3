import { program } from "./src/cli/index";
import { logError } from "./src/utils/logger";

program.parseAsync(process.argv).catch((error: unknown) => {
	logError("Unhandled CLI failure", error);
	console.error(error);
	process.exit(1);
});
