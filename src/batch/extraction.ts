import { z } from "zod";

export const ExtractedContactSchema = z.object({
	customer_name: z.string(),
	email: z.string(),
	phone: z.string(),
});

export type ExtractedContact = z.infer<typeof ExtractedContactSchema>;

export const createExtractionPrompt = (transcript: string): string =>
	"Extract the following from this call transcript:\n" +
	"- Customer name\n" +
	"- Email address\n" +
	"- Phone number\n\n" +
	`Transcript: ${transcript}\n\n` +
	"Return as JSON with keys: customer_name, email, phone";

/**
 * Decodes the model's JSON answer.
 * @throws {SyntaxError|z.ZodError} when the text is not a contact object
 */
export const decodeContact = (text: string): ExtractedContact =>
	ExtractedContactSchema.parse(JSON.parse(text.trim()));

export const describeContact = (contact: ExtractedContact): string =>
	JSON.stringify(contact);
