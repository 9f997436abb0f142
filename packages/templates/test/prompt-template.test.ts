import { describe, expect, it } from "vitest";
import {
  MalformedTemplateError,
  MissingVariableError,
  aiMessage,
  createDocument,
  humanMessage,
} from "@promptweave/types";
import { PromptTemplate } from "../src/prompt-template";

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("PromptTemplate (fstring)", () => {
  it("declares referenced variables in first-use order", () => {
    const template = new PromptTemplate("{greeting}, {name}! {greeting} again.");

    expect(template.inputVariables).toEqual(["greeting", "name"]);
  });

  it("substitutes every variable", () => {
    const template = new PromptTemplate("Translate {text} into {language}.");

    expect(template.render({ text: "hello", language: "French" })).toBe(
      "Translate hello into French.",
    );
  });

  it("treats doubled braces as literal braces", () => {
    const template = new PromptTemplate('Reply with {{"answer": "{value}"}}');

    expect(template.inputVariables).toEqual(["value"]);
    expect(template.render({ value: "42" })).toBe('Reply with {"answer": "42"}');
  });

  it("names the missing variable", () => {
    const template = new PromptTemplate("{a} and {b}");

    expect(() => template.render({ a: "x" })).toThrow(MissingVariableError);
    try {
      template.render({ a: "x" });
    } catch (error) {
      expect(error).toMatchObject({ kind: "missing_variable", variable: "b" });
    }
  });

  it.each([
    ["{unclosed", "unclosed placeholder"],
    ["stray } brace", "unmatched closing brace"],
    ["{outer{inner}}", "nested placeholders are not supported"],
    ["{user.name}", 'unsupported placeholder expression "user.name"'],
    ["{}", "empty placeholder"],
  ])("rejects %s as malformed", (source, reason) => {
    let captured: unknown;
    try {
      new PromptTemplate(source);
    } catch (error) {
      captured = error;
    }

    expect(captured).toBeInstanceOf(MalformedTemplateError);
    expect(captured).toMatchObject({ reason });
  });

  it("rejects references missing from an explicit variable list", () => {
    expect(
      () => new PromptTemplate("{a} {b}", { inputVariables: ["a"] }),
    ).toThrow("references undeclared variable(s): b");
  });

  it("requires declared variables even when unused", () => {
    const template = new PromptTemplate("static text", { inputVariables: ["topic"] });

    expect(() => template.render({})).toThrow(MissingVariableError);
    expect(template.render({ topic: "x" })).toBe("static text");
  });

  it("renders non-text values", () => {
    const template = new PromptTemplate("{count}|{flag}|{data}|{history}|{docs}");

    const rendered = template.render({
      count: 3,
      flag: true,
      data: { k: [1, 2] },
      history: [humanMessage("hi"), aiMessage("hello")],
      docs: [createDocument("first"), createDocument("second")],
    });

    expect(rendered).toBe(
      '3|true|{"k":[1,2]}|human: hi\nai: hello|first\n\nsecond',
    );
  });

  it("binds partial variables ahead of time", () => {
    const template = new PromptTemplate("{tools}\n{input}").partial({ tools: "search" });

    expect(template.inputVariables).toEqual(["input"]);
    expect(template.render({ input: "go" })).toBe("search\ngo");
    expect(template.render({ input: "go", tools: "calc" })).toBe("calc\ngo");
  });

  it("formats to a string prompt", () => {
    expect(new PromptTemplate("Hi {name}").formatPrompt({ name: "Ada" })).toEqual({
      kind: "string",
      text: "Hi Ada",
    });
  });
});

describe("PromptTemplate (jinja2)", () => {
  it("infers top-level variables and ignores loop locals", () => {
    const template = new PromptTemplate(
      "{{ intro }}{% for item in items %}- {{ item }}\n{% endfor %}",
      { format: "jinja2" },
    );

    expect(template.inputVariables).toEqual(["intro", "items"]);
    expect(template.render({ intro: "List:\n", items: ["a", "b"] })).toBe("List:\n- a\n- b\n");
  });

  it("declares names read inside expressions and control tags", () => {
    const template = new PromptTemplate(
      "{% if flag %}{{ a ~ b | upper }}{% endif %}{{ fmt(x, sep=y) }}{{ n is defined }}",
      { format: "jinja2" },
    );

    expect(template.inputVariables).toEqual(["flag", "a", "b", "fmt", "x", "y", "n"]);
  });

  it("fails on a missing operand instead of rendering undefined", () => {
    const template = PromptTemplate.fromTemplate("{{ a ~ b }}", { format: "jinja2" });

    expect(() => template.render({ a: "x" })).toThrow(MissingVariableError);
    expect(catchError(() => template.render({ a: "x" }))).toMatchObject({ variable: "b" });
  });

  it("fails on a missing condition instead of skipping the block", () => {
    const template = PromptTemplate.fromTemplate("{% if flag %}on{% endif %}done", {
      format: "jinja2",
    });

    expect(catchError(() => template.render({}))).toMatchObject({
      kind: "missing_variable",
      variable: "flag",
    });
    expect(template.render({ flag: false })).toBe("done");
  });

  it("names a missing attribute of a supplied value", () => {
    const template = new PromptTemplate("{{ user.name }} ({{ user.role }})", {
      format: "jinja2",
    });

    expect(catchError(() => template.render({ user: { name: "Ada" } }))).toMatchObject({
      kind: "missing_variable",
      variable: "user.role",
    });
  });

  it("renders with nunjucks", () => {
    const template = new PromptTemplate("Hello {{ name | upper }}!", { format: "jinja2" });

    expect(template.render({ name: "ada" })).toBe("Hello ADA!");
  });

  it("passes nested mappings through for attribute access", () => {
    const template = new PromptTemplate("{{ user.name }} ({{ user.role }})", {
      format: "jinja2",
    });

    expect(template.render({ user: { name: "Ada", role: "admin" } })).toBe("Ada (admin)");
  });

  it("reports syntax errors as malformed templates", () => {
    expect(
      () => new PromptTemplate("{% if x %}unterminated", { format: "jinja2" }),
    ).toThrow(MalformedTemplateError);
  });

  it("fails fast on a missing variable", () => {
    const template = new PromptTemplate("{{ question }}", { format: "jinja2" });

    expect(() => template.render({})).toThrow(MissingVariableError);
  });
});
