import chalk from "chalk";
import { listProjects } from "../projects.js";
import { formatDateTime, plural } from "../utils/text.js";
import type { CommandContext } from "./context.js";

export function runProjects(ctx: CommandContext): void {
	const projects = listProjects(ctx.projectsDir);
	if (projects.length === 0) {
		ctx.output.log(`No projects found in ${ctx.projectsDir}`);
		return;
	}
	const width = Math.max(...projects.map((p) => p.name.length));
	ctx.output.log(chalk.bold(`Projects in ${ctx.projectsDir}:`));
	for (const project of projects) {
		const modified = formatDateTime(new Date(project.modified).toISOString());
		ctx.output.log(
			`  ${chalk.cyan(project.name.padEnd(width))}  ${plural(project.sessionCount, "session").padStart(12)}  ${chalk.dim(modified)}`,
		);
	}
}
