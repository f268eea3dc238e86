import { describe, expect, it } from "vitest";
import { getEndpointIdentity, toEndpointUrl } from "./endpoint-identity.ts";

describe("getEndpointIdentity", () => {
	it("drops the query string", () => {
		expect(getEndpointIdentity("http://host.test/path?x=1")).toBe("http://host.test/path");
	});

	it("maps different queries on the same path to one identity", () => {
		expect(getEndpointIdentity("http://host.test/path?x=1")).toBe(
			getEndpointIdentity("http://host.test/path?x=2"),
		);
	});

	it("keeps a non-default port and drops the fragment", () => {
		expect(getEndpointIdentity("https://mirror.test:8443/v3/index.json?q=a#top")).toBe(
			"https://mirror.test:8443/v3/index.json",
		);
	});

	it("normalises scheme, host case and default port", () => {
		expect(getEndpointIdentity("HTTP://Mirror.TEST:80/a?b=c")).toBe("http://mirror.test/a");
	});

	it("gives a bare host the root path", () => {
		expect(getEndpointIdentity(new URL("http://mirror.test"))).toBe("http://mirror.test/");
	});
});

describe("toEndpointUrl", () => {
	it("returns URL instances unchanged", () => {
		const url = new URL("http://mirror.test/a");
		expect(toEndpointUrl(url)).toBe(url);
	});

	it("throws on malformed input", () => {
		expect(() => toEndpointUrl("not a url")).toThrow(TypeError);
	});
});
