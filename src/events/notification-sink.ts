/**
 * NotificationSink — where classified fills are announced.
 *
 * Sinks are synchronous and called once per applied fill, after the ledger
 * has changed. A sink that throws does not undo the fill.
 */

import EventEmitter from "eventemitter3";
import type { Logger } from "../lib/logger/index.js";
import { formatNotification } from "../reporting/format.js";
import type { FillNotification } from "./fill-notification.js";

export interface NotificationSink {
	notify(notification: FillNotification): void;
}

/** Discards everything. */
export const nullSink: NotificationSink = {
	notify(): void {},
};

/** Receives an error thrown while a notification was being delivered. */
export type HandlerErrorCallback = (error: unknown, notification: FillNotification) => void;

export interface NotificationEvents {
	fill: (notification: FillNotification) => void;
}

/**
 * Fans notifications out to in-process listeners.
 *
 * Listeners run in registration order. Without an `onHandlerError` callback a
 * throwing listener propagates to the caller; with one, the error is handed
 * over and the remaining listeners still run.
 */
export class EmitterNotificationSink implements NotificationSink {
	private readonly emitter = new EventEmitter<NotificationEvents>();
	private readonly listeners: ((notification: FillNotification) => void)[] = [];
	private readonly onHandlerError: HandlerErrorCallback | null;

	constructor(onHandlerError?: HandlerErrorCallback) {
		this.onHandlerError = onHandlerError ?? null;
	}

	/** @returns Unsubscribe function */
	onFill(listener: (notification: FillNotification) => void): () => void {
		const guarded = this.onHandlerError ? this.guard(listener, this.onHandlerError) : listener;
		this.emitter.on("fill", guarded);
		this.listeners.push(guarded);
		return () => {
			this.emitter.off("fill", guarded);
			const idx = this.listeners.indexOf(guarded);
			if (idx !== -1) this.listeners.splice(idx, 1);
		};
	}

	listenerCount(): number {
		return this.emitter.listenerCount("fill");
	}

	notify(notification: FillNotification): void {
		this.emitter.emit("fill", notification);
	}

	/** Remove all listeners */
	clear(): void {
		for (const listener of this.listeners) {
			this.emitter.off("fill", listener);
		}
		this.listeners.length = 0;
	}

	private guard(
		listener: (notification: FillNotification) => void,
		onError: HandlerErrorCallback,
	): (notification: FillNotification) => void {
		return (notification) => {
			try {
				listener(notification);
			} catch (error: unknown) {
				onError(error, notification);
			}
		};
	}
}

/** Writes one info line per fill: the formatted alert plus structured fields. */
export class LoggerNotificationSink implements NotificationSink {
	private readonly logger: Logger;

	constructor(logger: Logger) {
		this.logger = logger.child({ component: "notifications" });
	}

	notify(notification: FillNotification): void {
		this.logger.info(
			{
				kind: notification.kind,
				fillId: notification.fillId,
				tokenId: notification.tokenId,
				marketId: notification.marketId,
				...(notification.realizedPnl !== undefined
					? { realizedPnl: notification.realizedPnl.toString() }
					: {}),
			},
			formatNotification(notification),
		);
	}
}

/** Forwards each notification to every sink in order. */
export function combineSinks(...sinks: readonly NotificationSink[]): NotificationSink {
	return {
		notify(notification: FillNotification): void {
			for (const sink of sinks) {
				sink.notify(notification);
			}
		},
	};
}
