import { describe, it, expect, vi, afterEach } from "vitest";
import Logger from "../logger";

describe("Logger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("writes progress messages to stderr, leaving stdout to the article", () => {
        const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
        const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

        Logger.getInstance().log("Loaded source: notes.txt");

        expect(stdout).not.toHaveBeenCalled();
        expect(stderr).toHaveBeenCalledTimes(1);
        expect(stderr).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] \[INFO\] Loaded source: notes\.txt$/));
    });

    it("writes warnings to stderr", () => {
        const stdout = vi.spyOn(console, "log").mockImplementation(() => {});
        const stderr = vi.spyOn(console, "error").mockImplementation(() => {});

        Logger.getInstance().warn("slow reply");

        expect(stdout).not.toHaveBeenCalled();
        expect(stderr).toHaveBeenCalledWith(expect.stringMatching(/\[WARN\] slow reply$/));
    });
});
