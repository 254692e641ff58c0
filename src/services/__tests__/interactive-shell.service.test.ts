import { describe, expect, it, vi } from "vitest";

import { FORKS_URL, branchesUrl, createCapturingLogger, createMockGateway, ok } from "../../__tests__/test-utils";
import { GatewayError } from "../../errors";
import { BranchCatalogService } from "../branch-catalog.service";
import { ForkCatalogService } from "../fork-catalog.service";
import { InteractiveShellService } from "../interactive-shell.service";
import { SyncEngineService } from "../sync-engine.service";

import type { AskFn } from "../interactive-shell.service";

const TWO_FORKS = [
  { full_name: "u/r1", parent: { full_name: "orig/r1" } },
  { full_name: "u/r2" },
];

function createShell() {
  const { gateway, call } = createMockGateway();
  const { logger, lines } = createCapturingLogger();
  const ask = vi.fn<AskFn>();
  const forkCatalog = new ForkCatalogService(gateway);
  const branchCatalog = new BranchCatalogService(gateway);
  const syncEngine = new SyncEngineService(gateway, forkCatalog, branchCatalog, { logger });
  const shell = new InteractiveShellService({ forkCatalog, branchCatalog, syncEngine, logger, ask });
  return { shell, call, ask, lines, syncEngine };
}

describe("InteractiveShellService", () => {
  describe("displayMenu", () => {
    it("should print the five menu entries", () => {
      const { shell, lines } = createShell();

      shell.displayMenu();

      expect(lines).toEqual([
        "\nGitHub Fork Management Menu",
        "1. List all forks",
        "2. List branches in a fork",
        "3. Sync branches for a specific fork",
        "4. Sync branches for all forks",
        "5. Exit",
      ]);
    });
  });

  describe("handleChoice", () => {
    it("should list forks with 1-based numbers", async () => {
      const { shell, call, lines } = createShell();
      call.mockResolvedValueOnce(ok(TWO_FORKS));

      const keepRunning = await shell.handleChoice("1");

      expect(keepRunning).toBe(true);
      expect(call).toHaveBeenCalledWith("GET", FORKS_URL);
      expect(lines).toEqual(["[SUCCESS] 1. u/r1", "[SUCCESS] 2. u/r2"]);
    });

    it("should say when there are no forks", async () => {
      const { shell, call, lines } = createShell();
      call.mockResolvedValueOnce(ok([]));

      await shell.handleChoice("1");

      expect(lines).toEqual(["[ERROR] No forks found."]);
    });

    it("should tell a failed fork listing apart from an empty one", async () => {
      const { shell, call, lines } = createShell();
      call.mockResolvedValueOnce({ ok: false, error: new GatewayError("GET", FORKS_URL, "Bad credentials", 401) });

      await shell.handleChoice("1");

      expect(lines).toEqual([`[ERROR] Failed to list forks: GET ${FORKS_URL} failed: Bad credentials`]);
    });

    it("should list the branches of the named repository", async () => {
      const { shell, call, ask, lines } = createShell();
      ask.mockResolvedValueOnce("u/r1");
      call.mockResolvedValueOnce(ok([{ name: "main" }, { name: "develop" }]));

      await shell.handleChoice("2");

      expect(ask).toHaveBeenCalledWith({ message: "Enter the full name of the fork (e.g., user/repo):" });
      expect(call).toHaveBeenCalledWith("GET", branchesUrl("u/r1"));
      expect(lines).toEqual(["[SUCCESS] - main", "[SUCCESS] - develop"]);
    });

    it("should say when a repository has no branches", async () => {
      const { shell, call, ask, lines } = createShell();
      ask.mockResolvedValueOnce("u/r1");
      call.mockResolvedValueOnce(ok([]));

      await shell.handleChoice("2");

      expect(lines).toEqual(["[ERROR] No branches found."]);
    });

    it("should reject a malformed repository name without calling the API", async () => {
      const { shell, call, ask, lines } = createShell();
      ask.mockResolvedValueOnce("r1");

      await shell.handleChoice("2");

      expect(call).not.toHaveBeenCalled();
      expect(lines).toEqual([
        "[ERROR] Failed to list branches: Invalid repository name 'r1'. Expected the form owner/repo",
      ]);
    });

    it("should sync the fork chosen by number", async () => {
      const { shell, call, ask, syncEngine, lines } = createShell();
      call.mockResolvedValueOnce(ok(TWO_FORKS));
      ask.mockResolvedValueOnce("1");
      const syncOne = vi.spyOn(syncEngine, "syncOne").mockResolvedValue({
        fork: "u/r1",
        upstream: "orig/r1",
        outcome: "synced",
        branches: [],
      });

      await shell.handleChoice("3");

      expect(ask).toHaveBeenCalledWith({ message: "Select a fork to sync (enter number):" });
      expect(syncOne).toHaveBeenCalledTimes(1);
      expect(syncOne).toHaveBeenCalledWith({ fullName: "u/r1", parentFullName: "orig/r1" }, "orig/r1");
      expect(lines).toEqual(["[SUCCESS] 1. u/r1", "[SUCCESS] 2. u/r2"]);
    });

    it.each(["0", "3", "-1", "abc", "", "1.5"])("should reject the selection '%s' without syncing", async (answer) => {
      const { shell, call, ask, syncEngine, lines } = createShell();
      call.mockResolvedValueOnce(ok(TWO_FORKS));
      ask.mockResolvedValueOnce(answer);
      const syncOne = vi.spyOn(syncEngine, "syncOne");

      const keepRunning = await shell.handleChoice("3");

      expect(keepRunning).toBe(true);
      expect(syncOne).not.toHaveBeenCalled();
      expect(call).toHaveBeenCalledTimes(1);
      expect(lines[lines.length - 1]).toBe("[ERROR] Invalid selection.");
    });

    it("should warn when the chosen fork has no upstream", async () => {
      const { shell, call, ask, syncEngine, lines } = createShell();
      call.mockResolvedValueOnce(ok(TWO_FORKS));
      ask.mockResolvedValueOnce("2");
      const syncOne = vi.spyOn(syncEngine, "syncOne");

      await shell.handleChoice("3");

      expect(syncOne).not.toHaveBeenCalled();
      expect(call).toHaveBeenCalledTimes(1);
      expect(lines[lines.length - 1]).toBe("[WARNING] Original repository not found.");
    });

    it("should not ask for a number when there are no forks", async () => {
      const { shell, call, ask, lines } = createShell();
      call.mockResolvedValueOnce(ok([]));

      await shell.handleChoice("3");

      expect(ask).not.toHaveBeenCalled();
      expect(lines).toEqual(["[ERROR] No forks found."]);
    });

    it("should sync every fork", async () => {
      const { shell, syncEngine } = createShell();
      const syncAll = vi.spyOn(syncEngine, "syncAll").mockResolvedValue([]);

      const keepRunning = await shell.handleChoice("4");

      expect(keepRunning).toBe(true);
      expect(syncAll).toHaveBeenCalledTimes(1);
    });

    it("should stop on the exit option", async () => {
      const { shell, call, lines } = createShell();

      const keepRunning = await shell.handleChoice("5");

      expect(keepRunning).toBe(false);
      expect(call).not.toHaveBeenCalled();
      expect(lines).toEqual(["[SUCCESS] Exiting GitHub Fork Management."]);
    });

    it("should accept surrounding whitespace", async () => {
      const { shell } = createShell();

      expect(await shell.handleChoice(" 5 \n")).toBe(false);
    });

    it.each(["6", "x", "", "12"])("should report '%s' as an invalid choice", async (choice) => {
      const { shell, call, lines } = createShell();

      const keepRunning = await shell.handleChoice(choice);

      expect(keepRunning).toBe(true);
      expect(call).not.toHaveBeenCalled();
      expect(lines).toEqual(["[ERROR] Invalid choice."]);
    });
  });

  describe("run", () => {
    it("should loop until the exit option is chosen", async () => {
      const { shell, call, ask, lines } = createShell();
      ask.mockResolvedValueOnce("9").mockResolvedValueOnce("1").mockResolvedValueOnce("5");
      call.mockResolvedValueOnce(ok(TWO_FORKS));

      await shell.run();

      expect(ask).toHaveBeenCalledTimes(3);
      expect(ask).toHaveBeenCalledWith({ message: "Enter your choice:" });
      expect(lines.filter((line) => line === "\nGitHub Fork Management Menu")).toHaveLength(3);
      expect(lines).toContain("[ERROR] Invalid choice.");
      expect(lines).toContain("[SUCCESS] 2. u/r2");
      expect(lines[lines.length - 1]).toBe("[SUCCESS] Exiting GitHub Fork Management.");
    });

    it("should end the session when the prompt is aborted", async () => {
      const { shell, ask, lines } = createShell();
      const abort = new Error("User force closed the prompt with SIGINT");
      abort.name = "ExitPromptError";
      ask.mockRejectedValueOnce(abort);

      await expect(shell.run()).resolves.toBeUndefined();

      expect(lines[lines.length - 1]).toBe("[SUCCESS] Exiting GitHub Fork Management.");
    });

    it("should rethrow other prompt failures", async () => {
      const { shell, ask } = createShell();
      ask.mockRejectedValueOnce(new Error("stdin closed"));

      await expect(shell.run()).rejects.toThrow("stdin closed");
    });
  });
});
