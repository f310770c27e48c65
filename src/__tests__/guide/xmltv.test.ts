/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * xmltv.test.ts: Tests for XMLTV guide generation.
 */
import { describe, expect, test } from "@jest/globals";
import { formatXmltvTime, generateXmltv } from "../../guide/xmltv.js";
import { makeChannel } from "../helpers/channels.js";

const NOW = new Date(Date.UTC(2026, 4, 1, 12, 0, 0));

describe("formatXmltvTime", () => {

  test("formats in UTC with an explicit offset", () => {

    expect(formatXmltvTime(new Date(Date.UTC(2026, 0, 2, 3, 4, 5)))).toBe("20260102030405 +0000");
  });
});

describe("generateXmltv", () => {

  test("lists every channel, then one programme per channel around now", () => {

    const channels = [
      makeChannel("alice", true, { artworkUrl: "https://static.example/a.png", category: "Celeste", displayName: "Alice", thumbnailUrl: "https://static.example/t.jpg",
        title: "Any% <fast>" }),
      makeChannel("bob", false, { displayName: "Bob" })
    ];

    expect(generateXmltv(channels, NOW).split("\n")).toEqual([
      "<?xml version=\"1.0\" encoding=\"utf-8\"?>",
      "<tv generator-info-name=\"TwitchTuner\">",
      "  <channel id=\"alice\">",
      "    <display-name>Alice</display-name>",
      "    <display-name>1</display-name>",
      "    <icon src=\"https://static.example/a.png\" />",
      "  </channel>",
      "  <channel id=\"bob\">",
      "    <display-name>Bob</display-name>",
      "    <display-name>2</display-name>",
      "  </channel>",
      "  <programme start=\"20260501110000 +0000\" stop=\"20260502120000 +0000\" channel=\"alice\">",
      "    <title>Any% &lt;fast&gt;</title>",
      "    <desc>Playing Celeste</desc>",
      "    <category>Celeste</category>",
      "    <icon src=\"https://static.example/t.jpg\" />",
      "  </programme>",
      "  <programme start=\"20260501110000 +0000\" stop=\"20260502120000 +0000\" channel=\"bob\">",
      "    <title>Bob is Offline</title>",
      "    <desc>Channel is currently offline</desc>",
      "    <category>Offline</category>",
      "  </programme>",
      "</tv>",
      ""
    ]);
  });

  test("a live channel without a title or category gets a generic programme", () => {

    const lines = generateXmltv([makeChannel("carol", true, { category: "", displayName: "Carol", title: "" })], NOW).split("\n");

    expect(lines).toContain("    <title>Carol is Live</title>");
    expect(lines).toContain("    <desc>Live on Twitch</desc>");
    expect(lines.some((line) => line.includes("<category>"))).toBe(false);
  });

  test("an empty channel list is still a valid document", () => {

    expect(generateXmltv([], NOW)).toBe("<?xml version=\"1.0\" encoding=\"utf-8\"?>\n<tv generator-info-name=\"TwitchTuner\">\n</tv>\n");
  });
});
