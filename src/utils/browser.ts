import { spawn } from "child_process";

function openCommand(url: string): [string, string[]] {
  switch (process.platform) {
    case "darwin":
      return ["open", [url]];
    case "win32":
      return ["cmd", ["/c", "start", "", url]];
    default:
      return ["xdg-open", [url]];
  }
}

/** Best effort: a missing browser only produces a warning. */
export function openInBrowser(url: string): void {
  const [command, args] = openCommand(url);
  const child = spawn(command, args, { detached: true, stdio: "ignore" });
  child.on("error", (error) => {
    console.warn(`Could not open a browser (${error.message}).`);
  });
  child.unref();
}
