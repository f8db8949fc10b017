import { describe, expect, test } from "vitest";
import { PassThrough } from "node:stream";
import { createStreamLineSource } from "../src/gate/line-source";

describe("createStreamLineSource", () => {
  test("keeps lines that arrive in one chunk for later prompts", async () => {
    const input = new PassThrough();
    const source = createStreamLineSource(input);
    input.end("yes\n\n");

    expect(await source.readLine()).toBe("yes");
    expect(await source.readLine()).toBe("");
    expect(await source.readLine()).toBeNull();
    source.close();
  });

  test("strips CRLF terminators", async () => {
    const input = new PassThrough();
    const source = createStreamLineSource(input);
    input.end("y\r\n");

    expect(await source.readLine()).toBe("y");
    source.close();
  });

  test("returns a final line that has no newline", async () => {
    const input = new PassThrough();
    const source = createStreamLineSource(input);
    input.end("no");

    expect(await source.readLine()).toBe("no");
    expect(await source.readLine()).toBeNull();
    source.close();
  });

  test("waits for input that arrives later", async () => {
    const input = new PassThrough();
    const source = createStreamLineSource(input);
    const pending = source.readLine();
    setTimeout(() => input.write("later\n"), 10);

    expect(await pending).toBe("later");
    source.close();
  });

  test("end of input on an empty stream", async () => {
    const input = new PassThrough();
    const source = createStreamLineSource(input);
    input.end();

    expect(await source.readLine()).toBeNull();
    source.close();
  });
});
