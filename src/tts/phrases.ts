import type { TestItem } from "../shared/types";

export const TTS_PHRASES: readonly TestItem[] = Object.freeze([
	{
		id: "greeting-de",
		text: "Es freut mich, Sie kennenzulernen, Ich hoffe, Sie haben einen schönen Tag",
	},
	{
		id: "appointment-de",
		text: "Ihr Termin ist am Dienstag um zehn Uhr bestätigt.",
	},
	{
		id: "farewell-de",
		text: "Vielen Dank für Ihren Anruf und auf Wiederhören!",
	},
]);
