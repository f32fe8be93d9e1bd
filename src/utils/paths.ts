import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'normalize-filename';

const isMac = process.platform === 'darwin';

function appNameOrDefault(app: string) {
	const trimmed = app?.trim();
	return trimmed && trimmed.length > 0 ? trimmed : APP_NAME;
}

export function configDir(app = APP_NAME) {
	const appName = appNameOrDefault(app);
	const override = process.env.NORMALIZE_FILENAME_HOME;
	if (override && override.length > 0) return override;
	const xdg = process.env.XDG_CONFIG_HOME;
	if (xdg && xdg.length > 0) return path.join(xdg, appName);
	if (isMac) return path.join(os.homedir(), 'Library', 'Application Support', appName);
	return path.join(os.homedir(), '.config', appName);
}

export function stateDir(app = APP_NAME) {
	const appName = appNameOrDefault(app);
	const override = process.env.NORMALIZE_FILENAME_STATE;
	if (override && override.length > 0) return override;
	const xdg = process.env.XDG_STATE_HOME;
	if (xdg && xdg.length > 0) return path.join(xdg, appName);
	if (isMac) return path.join(os.homedir(), 'Library', 'Application Support', appName);
	return path.join(os.homedir(), '.local', 'state', appName);
}

export function logsDir(app = APP_NAME) {
	const override = process.env.NORMALIZE_FILENAME_LOGS;
	if (override && override.length > 0) return override;
	const appName = appNameOrDefault(app);
	const xdgState = process.env.XDG_STATE_HOME;
	if (xdgState && xdgState.length > 0) return path.join(xdgState, appName, 'logs');
	if (isMac) return path.join(os.homedir(), 'Library', 'Logs', appName);
	return path.join(os.homedir(), '.local', 'state', appName, 'logs');
}

export function defaultUndoLogPath() {
	return path.join(stateDir(), 'undo.sh');
}
