import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";

import { portOptionParse } from "./portOptionParse.js";

describe("portOptionParse", () => {
    it("parses valid ports", () => {
        expect(portOptionParse("5000")).toBe(5000);
        expect(portOptionParse("65535")).toBe(65535);
    });

    it("rejects out-of-range and non-numeric values", () => {
        expect(() => portOptionParse("0")).toThrow(InvalidArgumentError);
        expect(() => portOptionParse("65536")).toThrow("Invalid port: 65536");
        expect(() => portOptionParse("http")).toThrow(InvalidArgumentError);
        expect(() => portOptionParse("80.5")).toThrow(InvalidArgumentError);
    });
});
