/**
 * Clipboard writing utility.
 *
 * Writes text to the system clipboard using OS-native tools:
 * - macOS: `pbcopy`
 * - Linux/Wayland: `wl-copy`
 * - Linux/X11: `xclip`, then `xsel`
 * - Windows: `clip`
 */

import { spawnSync } from "node:child_process";

const DEFAULT_WRITE_TIMEOUT_MS = 3000;

export type ClipboardWriter = (text: string) => boolean;

interface ClipboardCommand {
	command: string;
	args: string[];
}

function isWaylandSession(env: NodeJS.ProcessEnv = process.env): boolean {
	return Boolean(env.WAYLAND_DISPLAY) || env.XDG_SESSION_TYPE === "wayland";
}

export function clipboardCommands(
	platform: NodeJS.Platform = process.platform,
	env: NodeJS.ProcessEnv = process.env,
): ClipboardCommand[] {
	if (platform === "darwin") return [{ command: "pbcopy", args: [] }];
	if (platform === "win32") return [{ command: "clip", args: [] }];

	const x11: ClipboardCommand[] = [
		{ command: "xclip", args: ["-selection", "clipboard"] },
		{ command: "xsel", args: ["--clipboard", "--input"] },
	];
	return isWaylandSession(env) ? [{ command: "wl-copy", args: [] }, ...x11] : x11;
}

function runCommand(command: ClipboardCommand, input: string): boolean {
	const result = spawnSync(command.command, command.args, {
		input,
		timeout: DEFAULT_WRITE_TIMEOUT_MS,
		stdio: ["pipe", "ignore", "ignore"],
	});
	return !result.error && result.status === 0;
}

/** Copy text with the first clipboard tool that succeeds. */
export const copyToClipboard: ClipboardWriter = (text) => {
	for (const command of clipboardCommands()) {
		if (runCommand(command, text)) return true;
	}
	return false;
};
