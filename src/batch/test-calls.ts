import type { TestItem } from "../shared/types";

export const TEST_CALLS: readonly TestItem[] = Object.freeze([
	{
		id: "call-1",
		text: "Agent: Hello! Customer: My name is John Doe, email john@example.com, phone 555-1234",
	},
	{
		id: "call-2",
		text: "Agent: Hi there! Customer: I'm Jane Smith, jane@test.com, 555-5678",
	},
	{
		id: "call-3",
		text: "Agent: Good morning! Customer: This is Bob Wilson, bob@company.com, 555-9012",
	},
	{
		id: "call-4",
		text: "Agent: Welcome! Customer: Alice Brown here, alice@email.com, 555-3456",
	},
	{
		id: "call-5",
		text: "Agent: How can I help? Customer: I'm Charlie Davis, charlie@mail.com, 555-7890",
	},
]);
