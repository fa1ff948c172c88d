/**
 * Where user-visible outcome messages go (toasts in the UI)
 */
export interface Notifier {
	success(message: string): void;
	error(message: string): void;
}

export const consoleNotifier: Notifier = {
	success: (message) => console.log(`[Scorebook] ${message}`),
	error: (message) => console.warn(`[Scorebook] ${message}`),
};
