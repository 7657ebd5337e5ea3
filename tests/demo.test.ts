import { runDemo } from "../src/demo";

describe("demo", () => {
  it("runs the logging improvement end to end", async () => {
    const autopilot = await runDemo();

    await expect(autopilot.ide.readFile("src/login.ts")).resolves.toBe(
      "console.log('User logged in successfully');\nexport {};\n"
    );

    const { timeline } = autopilot.getState().history;
    expect(timeline.map((n) => [n.name, n.depth])).toEqual([
      ["ImproveLoggingStep", 0],
      ["FileSystemEditStep", 1],
      ["FileSystemEditStep", 1],
      ["EditCodeStep", 1],
      ["FileSystemEditStep", 2],
      ["WaitForUserConfirmationStep", 1],
      ["ShellCommandsStep", 1],
    ]);
    expect(timeline[0].observation).toEqual({
      kind: "text",
      text: "[fake] npm test: all tests passed",
    });
    expect(timeline[0].chatContext).toEqual([
      { role: "assistant", content: "Tests finished: [fake] npm test: all tests passed" },
    ]);
    expect(timeline[5].observation).toEqual({ kind: "user_input", userInput: "yes" });
  });
});
