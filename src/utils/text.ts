/** Cuts `text` to `max` code points, marking the cut with "...". */
export const truncate = (text: string, max: number): string => {
	const chars = Array.from(text);
	return chars.length > max ? `${chars.slice(0, max).join("")}...` : text;
};

export const formatElapsed = (seconds: number): string => {
	const whole = Math.max(0, Math.floor(seconds));
	const minutes = Math.floor(whole / 60);
	const secs = whole % 60;
	return `${minutes}:${secs.toString().padStart(2, "0")}`;
};
