import * as readline from "readline";

/** Resolves with an empty answer when stdin ends before a line is read. */
export function askQuestion(query: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.on("close", () => resolve(""));
    rl.question(query, (ans) => {
      resolve(ans);
      rl.close();
    });
  });
}

export async function confirm(query: string): Promise<boolean> {
  const ans = await askQuestion(`${query} (y/N) `);
  return ans.trim().toLowerCase() === "y";
}
