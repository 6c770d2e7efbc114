export type DaemonStatus = "idle" | "recording" | "processing" | "inserting";

export type DisplayState =
	| "hidden"
	| "recording"
	| "processing"
	| "success"
	| "error";

export interface DisplaySnapshot {
	state: DisplayState;
	label: string;
	elapsedSeconds?: number;
	text?: string;
	message?: string;
	/** Epoch ms at which a Success/Error display reverts to hidden. */
	autoHideAt?: number;
}

export interface OverlaySettings {
	theme: "dark" | "light";
	position: "top-center" | "top-left" | "top-right";
	animationDurationMs: number;
}

export type IPCMessage =
	| {
			type: "hello";
			version: number;
			status: DaemonStatus;
			display: DisplaySnapshot;
			ui: OverlaySettings;
	  }
	| {
			type: "state";
			status: DaemonStatus;
			display: DisplaySnapshot;
	  };
