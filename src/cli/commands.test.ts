import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TraktError } from "../errors";
import type { HistoryEntry, HistoryType } from "../types";
import type { RemovalResult } from "../services/trakt";
import { runCli, type CliContext } from "./commands";

const env = {
  TRAKT_CLIENT_ID: "test-client",
  TRAKT_CLIENT_SECRET: "test-secret",
  TRAKT_USERNAME: "someone",
  DB_FILE_NAME: ":memory:",
};

function episode(id: number, watchedAt: string): HistoryEntry {
  return {
    id,
    watchedAt,
    progress: null,
    media: { traktId: 900, title: "Pilot" },
    show: { traktId: 1, title: "Example Show" },
  };
}

function setup(history: Partial<Record<HistoryType, HistoryEntry[] | Error>>) {
  const getHistory = vi.fn(async (type: HistoryType) => {
    const result = history[type] ?? [];
    if (result instanceof Error) throw result;
    return result;
  });
  const removeHistory = vi.fn(
    async (_ids: number[]): Promise<RemovalResult> => ({ notFound: [] }),
  );
  const authenticate = vi.fn(async () => undefined);
  const connect = vi.fn(() => ({
    authenticate,
    api: { getHistory, removeHistory },
  }));
  const confirm = vi.fn(async (_question: string) => true);
  const context: CliContext = {
    env,
    interactive: false,
    ask: async () => "",
    confirm,
    connect,
  };
  return { context, connect, authenticate, getHistory, removeHistory, confirm };
}

describe("runCli", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("exits with 1 when every requested type failed", async () => {
    const { context } = setup({
      movies: new TraktError("API Request failed: 500", 500),
      episodes: new TraktError("API Request failed: 502", 502),
    });

    await expect(runCli(["duplicates", "all"], context)).resolves.toBe(1);
  });

  it("exits with 0 when only some types failed", async () => {
    const { context } = setup({
      movies: new TraktError("API Request failed: 500", 500),
      episodes: [
        episode(10, "2024-01-01T10:00:00Z"),
        episode(11, "2024-01-03T10:00:00Z"),
      ],
    });

    await expect(runCli(["duplicates", "all"], context)).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(
      "[2024-01-01T10:00:00Z] Example Show - Pilot (10)",
    );
    expect(console.log).toHaveBeenCalledWith(
      "movies: Failed to fetch history: API Request failed: 500",
    );
  });

  it("refuses --fix without --yes when stdin is not a terminal", async () => {
    const { context, connect, removeHistory } = setup({});

    await expect(runCli(["duplicates", "--fix"], context)).resolves.toBe(1);
    expect(connect).not.toHaveBeenCalled();
    expect(removeHistory).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      "--fix needs --yes when stdin is not a terminal.",
    );
  });

  it("asks before removing when run interactively", async () => {
    const { context, confirm, removeHistory } = setup({
      episodes: [
        episode(10, "2024-01-01T10:00:00Z"),
        episode(11, "2024-01-03T10:00:00Z"),
      ],
    });

    const code = await runCli(["duplicates", "episodes", "--fix"], {
      ...context,
      interactive: true,
    });

    expect(code).toBe(0);
    expect(confirm).toHaveBeenCalledWith("Delete 1 items?");
    expect(removeHistory.mock.calls).toEqual([[[10]]]);
  });

  it("removes without asking when --yes is given", async () => {
    const { context, confirm, removeHistory } = setup({
      episodes: [
        episode(10, "2024-01-01T10:00:00Z"),
        episode(11, "2024-01-03T10:00:00Z"),
      ],
    });

    const code = await runCli(
      ["duplicates", "--type", "episodes", "--fix", "--yes"],
      context,
    );

    expect(code).toBe(0);
    expect(confirm).not.toHaveBeenCalled();
    expect(removeHistory.mock.calls).toEqual([[[10]]]);
  });

  it("fails before any network call when credentials are missing", async () => {
    const { context, connect } = setup({});

    const code = await runCli(["duplicates"], {
      ...context,
      env: { ...env, TRAKT_USERNAME: undefined },
    });

    expect(code).toBe(1);
    expect(connect).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      "An error occurred:",
      "Missing TRAKT_USERNAME",
    );
  });

  it("runs the device flow for the auth command", async () => {
    const { context, authenticate, getHistory } = setup({});

    await expect(runCli(["auth"], context)).resolves.toBe(0);
    expect(authenticate).toHaveBeenCalledTimes(1);
    expect(getHistory).not.toHaveBeenCalled();
  });

  it("rejects unknown commands and types", async () => {
    const { context } = setup({});

    await expect(runCli(["sync"], context)).resolves.toBe(1);
    await expect(runCli(["duplicates", "shows"], context)).resolves.toBe(1);
  });
});
