import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "cashflow-checkup",
    {
      description:
        "Review the upcoming balance forecast, flag the lowest point, and suggest how to avoid running short",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please give me a cash flow checkup. Use these tools in order:\n\n1. **get_starting_balance** - Confirm the balance the forecast starts from\n2. **list_recurring** - List paychecks and bills that are currently active\n3. **get_upcoming_transactions** - Show what is due in the next 30 days\n4. **get_forecast** - Project the balance for the next 90 days\n5. **get_lowest_point** - Find the day the balance is lowest\n\nFormat the checkup with these sections:\n- **Starting Point**: Current balance and any missing data (e.g. no balance recorded)\n- **Coming Up**: Income and bills in the next 30 days\n- **Lowest Point**: Date, balance, and what causes the dip\n- **Risk**: Whether the balance goes negative and for how many days\n- **Suggestions**: 2-3 concrete steps, such as moving a bill date or pausing a recurring expense",
          },
        },
      ],
    })
  );
}
