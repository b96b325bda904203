export type TableRow = Record<string, string | number>;

export type CommandOutput = {
  lines: string[];
  table?: TableRow[];
};

export function printOutput(out: CommandOutput): void {
  if (out.table?.length) console.table(out.table);
  out.lines.forEach((line) => console.log(line));
}
