export { type FillNotification, toNotification } from "./fill-notification.js";
export {
	type HandlerErrorCallback,
	type NotificationEvents,
	type NotificationSink,
	EmitterNotificationSink,
	LoggerNotificationSink,
	combineSinks,
	nullSink,
} from "./notification-sink.js";
