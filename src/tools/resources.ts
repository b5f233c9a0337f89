import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { FinanceService } from "../service/finance.js";
import {
  forecastDayRecord,
  seriesRecord,
  summaryRecord,
} from "../service/records.js";

export function registerResources(server: McpServer, service: FinanceService) {
  server.registerResource(
    "forecast",
    "finance://forecast",
    {
      description: "Day-by-day balance forecast over the default window, with summary",
      mimeType: "application/json",
    },
    async (uri) => {
      const result = await service.forecast();
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "application/json",
            text: JSON.stringify(
              {
                summary: summaryRecord(result.summary),
                days: result.days.map(forecastDayRecord),
              },
              null,
              2
            ),
          },
        ],
      };
    }
  );

  server.registerResource(
    "recurring",
    "finance://recurring",
    {
      description: "All recurring series, active and paused",
      mimeType: "application/json",
    },
    async (uri) => {
      const series = await service.listRecurring();
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: "application/json",
            text: JSON.stringify(series.map(seriesRecord), null, 2),
          },
        ],
      };
    }
  );
}
