import { CommanderError } from "commander";
import { createProgram } from "../program";

describe("createProgram", () => {
  beforeEach(() => {
    jest.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it.each([[["deploy", "--bogus"]], [["secrets", "list", "--bogus"]]])(
    "should reject usage errors in %p instead of exiting",
    async (args) => {
      const exit = jest.spyOn(process, "exit").mockImplementation((code) => {
        throw new Error(`process.exit(${String(code)})`);
      });

      const parsing = createProgram().parseAsync(args, { from: "user" });

      await expect(parsing).rejects.toBeInstanceOf(CommanderError);
      await expect(parsing).rejects.toMatchObject({ code: "commander.unknownOption", exitCode: 1 });
      expect(exit).not.toHaveBeenCalled();
    }
  );

  it("should register every command", () => {
    const names = createProgram().commands.map((command) => command.name());

    expect(names).toEqual([
      "deploy",
      "status",
      "ssh",
      "destroy",
      "start",
      "stop",
      "logs",
      "secrets",
      "startup-script",
      "fetch-secrets",
      "doctor",
    ]);
  });
});
