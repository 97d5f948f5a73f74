import { describe, expect, it } from "vitest";
import { PubIdParseError } from "../../errors.js";
import { loadRegistryFile } from "../../registry/load.js";
import { buildCompactGrammar, matchCompact } from "../grammar.js";
import { detectInputStyle, parseComponents } from "../index.js";

const registry = loadRegistryFile();

function parseError(text: string): PubIdParseError {
	try {
		parseComponents(text, registry);
	} catch (err) {
		if (err instanceof PubIdParseError) return err;
		throw err;
	}
	throw new Error(`expected "${text}" to be rejected`);
}

describe("detectInputStyle", () => {
	it("treats whitespace-free input as machine-readable", () => {
		expect(detectInputStyle("NIST.SP.800-53r5")).toBe("mr");
		expect(detectInputStyle("NIST SP 800-53r5")).toBe("short");
		expect(detectInputStyle("  NIST.SP.800-53r5  ")).toBe("mr");
	});
});

describe("compact grammar", () => {
	it("orders marker slots as volume, part, iteration, version", () => {
		expect(buildCompactGrammar().source).toBe(
			"^(?<docnumber>.+?)(?:v(?<volume>\\d+))?(?:pt(?<part>\\d+[A-Z]?))?(?:r(?<revision>\\d+)|e(?<edition>\\d+))?(?:ver(?<version>\\d+))?$",
		);
	});

	it("splits the document number at the earliest marker run", () => {
		expect(matchCompact("800-57pt1r4")).toEqual({
			docnumber: "800-57",
			values: { part: "1", revision: "4" },
		});
		expect(matchCompact("1-1Cv1")).toEqual({ docnumber: "1-1C", values: { volume: "1" } });
	});

	it("reads 'ver' as version, never as volume", () => {
		expect(matchCompact("800-45ver2")).toEqual({ docnumber: "800-45", values: { version: "2" } });
	});

	it("keeps a trailing marker letter without digits in the document number", () => {
		expect(matchCompact("800-53r")).toEqual({ docnumber: "800-53r", values: {} });
	});
});

describe("parseComponents", () => {
	it("parses a short-form revision", () => {
		const parsed = parseComponents("NIST SP 800-53r5", registry);
		expect(parsed.style).toBe("short");
		expect(parsed.publisher).toBe("NIST");
		expect(parsed.series.key).toBe("NIST SP");
		expect(parsed.docnumber).toBe("800-53");
		expect(parsed.qualifiers).toEqual({ revision: 5 });
		expect(parsed.legacy).toBe(false);
	});

	it("parses part and revision together", () => {
		const parsed = parseComponents("NIST SP 800-57pt1r4", registry);
		expect(parsed.docnumber).toBe("800-57");
		expect(parsed.qualifiers).toEqual({ part: "1", revision: 4 });
	});

	it("keeps a sub-series letter in the document number", () => {
		const parsed = parseComponents("NIST NCSTAR 1-1Cv1", registry);
		expect(parsed.docnumber).toBe("1-1C");
		expect(parsed.qualifiers).toEqual({ volume: 1 });
	});

	it("parses an edition", () => {
		expect(parseComponents("NIST SP 800-53e5", registry).qualifiers).toEqual({ edition: 5 });
	});

	it("parses a short-form update", () => {
		const parsed = parseComponents("NIST SP 800-53r4/Upd 3:2015", registry);
		expect(parsed.qualifiers).toEqual({ revision: 4, update: { number: 3, date: "2015" } });
	});

	it("parses a machine-readable update", () => {
		const parsed = parseComponents("NIST.SP.800-53r4.u3-2015", registry);
		expect(parsed.style).toBe("mr");
		expect(parsed.docnumber).toBe("800-53");
		expect(parsed.qualifiers).toEqual({ revision: 4, update: { number: 3, date: "2015" } });
	});

	it("accepts a year-month update date", () => {
		const parsed = parseComponents("NIST.SP.800-53r4.u1-2020-05", registry);
		expect(parsed.qualifiers.update).toEqual({ number: 1, date: "2020-05" });
	});

	it("parses addenda in both forms", () => {
		expect(parseComponents("NIST SP 800-38A Addendum", registry).qualifiers).toEqual({
			addendum: 1,
		});
		expect(parseComponents("NIST SP 800-38A Addendum 2", registry).qualifiers).toEqual({
			addendum: 2,
		});
		const mr = parseComponents("NIST.SP.800-38A.add-1", registry);
		expect(mr.docnumber).toBe("800-38A");
		expect(mr.qualifiers).toEqual({ addendum: 1 });
	});

	it("parses a translation and lowercases its code", () => {
		expect(parseComponents("NIST IR 8115(ESP)", registry).qualifiers).toEqual({
			translation: "esp",
		});
		expect(parseComponents("NIST.IR.8115(esp)", registry).qualifiers).toEqual({
			translation: "esp",
		});
	});

	it("parses a glued stage in short form", () => {
		const parsed = parseComponents("NIST SP(IPD) 800-53r5", registry);
		expect(parsed.qualifiers).toEqual({ stage: "IPD", revision: 5 });
	});

	it("parses a stage field in machine-readable form", () => {
		const parsed = parseComponents("NIST.SP.IPD.800-53r5", registry);
		expect(parsed.docnumber).toBe("800-53");
		expect(parsed.qualifiers).toEqual({ stage: "IPD", revision: 5 });
	});

	it("normalizes retired series spellings", () => {
		const nistir = parseComponents("NISTIR 8115", registry);
		expect(nistir.series.key).toBe("NIST IR");
		expect(nistir.legacy).toBe(true);

		const fips = parseComponents("NBS FIPS 100", registry);
		expect(fips.series.key).toBe("NBS FIPS PUB");
		expect(fips.docnumber).toBe("100");
	});

	it("parses multi-word series in machine-readable form", () => {
		const parsed = parseComponents("NBS.FIPS.PUB.100", registry);
		expect(parsed.series.key).toBe("NBS FIPS PUB");
		expect(parsed.docnumber).toBe("100");
	});

	it("parses a number glued to the series code", () => {
		const parsed = parseComponents("NBS CRPL-F-B150", registry);
		expect(parsed.series.key).toBe("NBS CRPL-F-B");
		expect(parsed.docnumber).toBe("150");
	});

	describe("rejections", () => {
		it("rejects an unknown series", () => {
			const error = parseError("NIST WRONG-SERIE 800-11");
			expect(error.code).toBe("UNKNOWN_SERIES");
			expect(error.input).toBe("NIST WRONG-SERIE 800-11");
		});

		it("suggests the closest series for a typo", () => {
			const error = parseError("NIST SPP 800-53");
			expect(error.code).toBe("UNKNOWN_SERIES");
			expect(error.suggestion).toBe("NIST SP");
			expect(error.message).toBe('Unknown series in "NIST SPP 800-53". Did you mean "NIST SP"?');
		});

		it("rejects a series under the wrong publisher", () => {
			expect(parseError("NBS NCSTAR 1-1C").code).toBe("UNKNOWN_SERIES");
		});

		it("rejects a malformed document number", () => {
			const error = parseError("NIST SP WRONG-CODE");
			expect(error.code).toBe("MALFORMED_DOCNUMBER");
			expect(error.message).toBe('Malformed document number "WRONG-CODE" for series NIST SP');
		});

		it("applies a series-specific document number pattern", () => {
			const error = parseError("NBS CRPL-F-B 150-2");
			expect(error.code).toBe("MALFORMED_DOCNUMBER");
			expect(error.message).toBe('Malformed document number "150-2" for series NBS CRPL-F-B');
		});

		it("never absorbs an unknown marker into the document number", () => {
			expect(parseError("NIST SP 800-53x5").code).toBe("MALFORMED_DOCNUMBER");
			expect(parseError("NIST SP 800-53r").code).toBe("MALFORMED_DOCNUMBER");
		});

		it("rejects text after the document number", () => {
			const error = parseError("NIST SP 800-53 r5");
			expect(error.code).toBe("MALFORMED_DOCNUMBER");
			expect(error.message).toBe('Unexpected text after document number: "r5"');
		});

		it("rejects a missing document number", () => {
			expect(parseError("NIST SP").message).toBe("Missing document number");
			expect(parseError("NIST SP(IPD)").message).toBe("Missing document number");
		});

		it("rejects an unknown stage", () => {
			const error = parseError("NIST SP(XYZ) 800-53");
			expect(error.code).toBe("MALFORMED_DOCNUMBER");
			expect(error.message).toBe('Unknown stage "XYZ"');
		});

		it("rejects an addendum combined with an update", () => {
			expect(parseError("NIST SP 800-38A Addendum/Upd 1:2020").code).toBe("MALFORMED_DOCNUMBER");
			expect(parseError("NIST.SP.800-38A.add-1.u1-2020").code).toBe("MALFORMED_DOCNUMBER");
		});

		it("rejects empty machine-readable fields", () => {
			expect(parseError("NIST.SP..800-53").code).toBe("MALFORMED_DOCNUMBER");
		});

		it("rejects blank input", () => {
			const error = parseError("   ");
			expect(error.code).toBe("MALFORMED_DOCNUMBER");
			expect(error.message).toBe("Empty input");
		});
	});
});
