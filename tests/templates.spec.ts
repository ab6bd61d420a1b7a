import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { ConfigurationError } from "../src/shared/errors.js";
import { createTemplateRenderer, escapeHtml } from "../src/shared/templates.js";

let dir = "";

beforeAll(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "templates-"));
  await writeFile(path.join(dir, "greeting.html"), "Hello {{ name }}, you have {{count}} new messages.", "utf8");
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("escapeHtml", () => {
  it("escapes markup-significant characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;"
    );
  });
});

describe("template renderer", () => {
  it("substitutes and escapes variables", async () => {
    const renderer = createTemplateRenderer(dir);

    await expect(renderer.render("greeting", { name: "<b>Ann</b>", count: 3 })).resolves.toBe(
      "Hello &lt;b&gt;Ann&lt;/b&gt;, you have 3 new messages."
    );
  });

  it("refuses to render with missing variables", async () => {
    const renderer = createTemplateRenderer(dir);

    await expect(renderer.render("greeting", { name: "Ann" })).rejects.toThrow(
      "Configuration error: missing template variable(s) for 'greeting': count"
    );
  });

  it("rejects unknown templates and names outside the directory", async () => {
    const renderer = createTemplateRenderer(dir);

    await expect(renderer.render("missing")).rejects.toBeInstanceOf(ConfigurationError);
    await expect(renderer.render("../greeting")).rejects.toThrow(
      "Configuration error: invalid template name '../greeting'"
    );
  });

  it("renders the bundled welcome email", async () => {
    const renderer = createTemplateRenderer("src/templates");

    const html = await renderer.render("welcome", {
      user_name: "Ann",
      email: "ann@example.com",
      login_link: "http://localhost:5173/login",
    });

    expect(html).toContain("<h1 style=\"font-size: 22px; margin: 0 0 16px;\">Welcome, Ann!</h1>");
    expect(html).toContain('<a href="http://localhost:5173/login"');
  });
});
