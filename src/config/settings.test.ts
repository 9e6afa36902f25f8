import { describe, expect, it } from "vitest";
import { ValidationError } from "../core/errors";
import { DEFAULT_BREAKPOINTS_PATH } from "../pipeline/breakpoints";
import { loadSettings } from "./settings";

describe("loadSettings", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadSettings({})).toEqual({
      port: 8787,
      databasePath: "data/airquality.db",
      stageDir: "data/stage",
      breakpointsPath: DEFAULT_BREAKPOINTS_PATH,
      pollutants: ["88101"],
      tableMode: "auto",
      schedulerEnabled: true,
      aqs: {
        baseUrl: "https://aqs.epa.gov/data/api",
        email: undefined,
        key: undefined,
        states: ["37"],
        lookbackDays: 1,
      },
      envista: { baseUrl: undefined, apiKey: undefined, username: undefined, password: undefined },
    });
  });

  it("parses lists, flags and trims trailing slashes", () => {
    const settings = loadSettings({
      PORT: "3000",
      POLLUTANTS: " 88101, 81102 ,88101,",
      AQI_TABLE_MODE: "legacy",
      SCHEDULER_ENABLED: "no",
      AQS_BASE_URL: "https://aqs.example.test/api/",
      AQS_API_EMAIL: "someone@example.test",
      AQS_API_KEY: "test-secret",
      AQS_STATES: "37,06",
      AQS_LOOKBACK_DAYS: "7",
      ENVISTA_BASE_URL: "https://envista.example.test//",
      ENVISTA_API_KEY: "test-secret",
    });

    expect(settings.port).toBe(3000);
    expect(settings.pollutants).toEqual(["88101", "81102"]);
    expect(settings.tableMode).toBe("legacy");
    expect(settings.schedulerEnabled).toBe(false);
    expect(settings.aqs).toEqual({
      baseUrl: "https://aqs.example.test/api",
      email: "someone@example.test",
      key: "test-secret",
      states: ["37", "06"],
      lookbackDays: 7,
    });
    expect(settings.envista.baseUrl).toBe("https://envista.example.test");
  });

  it("treats blank values as unset", () => {
    const settings = loadSettings({ AQS_API_KEY: "  ", ENVISTA_BASE_URL: "" });
    expect(settings.aqs.key).toBeUndefined();
    expect(settings.envista.baseUrl).toBeUndefined();
  });

  it("rejects invalid values with every issue listed", () => {
    expect(() => loadSettings({ AQI_TABLE_MODE: "newest", AQS_STATES: "NC" })).toThrow(ValidationError);
    expect(() => loadSettings({ AQS_LOOKBACK_DAYS: "0" })).toThrow(/^Invalid configuration: AQS_LOOKBACK_DAYS/);
    expect(() => loadSettings({ POLLUTANTS: " , " })).toThrow(/at least one pollutant code is required/);
  });
});
