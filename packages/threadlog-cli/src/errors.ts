import chalk from "chalk";
import { errorToPayload, isThreadlogError } from "threadlog";

/** A failure the user can act on: bad arguments, no such project or session. */
export class CliError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "CliError";
	}
}

export function formatError(error: unknown): string {
	if (error instanceof CliError) {
		return chalk.red(`Error: ${error.message}`);
	}
	const payload = errorToPayload(error);
	const lines = [chalk.red(`Error [${payload.code}]: ${payload.message}`)];
	if (isThreadlogError(error) && error.file) {
		lines.push(chalk.dim(`  in ${error.file}`));
	}
	return lines.join("\n");
}
