export type ServiceFileEvent =
	| { kind: 'preview'; file: string; target: string; timestamp: number }
	| { kind: 'applied'; file: string; target: string; timestamp: number }
	| { kind: 'skipped'; file: string; timestamp: number; message?: string }
	| { kind: 'error'; file: string; timestamp: number; message: string };

export type RunSummary = {
	applied: number;
	previewed: number;
	skipped: number;
	failed: number;
	/** True when the user quit an interactive run early */
	aborted: boolean;
};

export type ServiceEventMap = {
	file: ServiceFileEvent;
	summary: RunSummary;
};
