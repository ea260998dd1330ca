/**
 * Demo tool collection served by the gateway entry point.
 */

import type { ToolCollection } from "@toolchat/toolbox";

const FORECASTS: Readonly<Record<string, { summary: string; celsius: number }>> = {
  lyon: { summary: "Sunny", celsius: 24 },
  oslo: { summary: "Light rain", celsius: 9 },
  lima: { summary: "Overcast", celsius: 18 },
};

function toFahrenheit(celsius: number): number {
  return Math.round((celsius * 9) / 5 + 32);
}

export const demoTools: ToolCollection = {
  lookup: {
    doc: `
      Look up the current weather for a city.

      Parameters
      ----------
      city : str
          Name of the city.
      units : {"celsius", "fahrenheit"}, optional
          Unit system for the temperature.
    `,
    params: [
      { name: "city", type: "str" },
      { name: "units", type: "str", default: "celsius" },
    ],
    execute: ({ city, units }) => {
      const forecast = FORECASTS[String(city).trim().toLowerCase()];
      if (!forecast) {
        return { error: `No forecast for ${String(city)}` };
      }
      const fahrenheit = units === "fahrenheit";
      return {
        city,
        summary: forecast.summary,
        temperature: fahrenheit ? toFahrenheit(forecast.celsius) : forecast.celsius,
        units: fahrenheit ? "fahrenheit" : "celsius",
      };
    },
  },

  current_time: {
    doc: `
      Current date and time as an ISO 8601 string.

      Parameters
      ----------
      timezone : str, optional
          IANA time zone name, e.g. "Europe/Paris". Defaults to UTC.
    `,
    params: [{ name: "timezone", type: "str", default: "UTC" }],
    execute: ({ timezone }) => {
      const timeZone = typeof timezone === "string" ? timezone : "UTC";
      const now = new Date();
      return {
        timezone: timeZone,
        iso: now.toISOString(),
        local: now.toLocaleString("en-GB", { timeZone }),
      };
    },
  },
};
