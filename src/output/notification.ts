import notifier from "node-notifier";
import { logger } from "../utils/logger";

export type NotificationType = "info" | "success" | "warning" | "error";

const iconMap: Record<NotificationType, string> = {
	info: "dialog-information",
	success: "emblem-default",
	warning: "dialog-warning",
	error: "dialog-error",
};

export const notify = (
	title: string,
	message: string,
	type: NotificationType = "info",
) => {
	try {
		notifier.notify({
			title: `hotmic: ${title}`,
			message,
			icon: iconMap[type],
			sound: type === "error",
			wait: false,
		});
		logger.debug({ title, type }, "Notification sent");
	} catch (error) {
		logger.error({ err: error }, "Failed to send notification");
	}
};
