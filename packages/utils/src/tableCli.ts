import Table, {
  type Cell,
  type CrossTableRow,
  type GenericTable,
  type HorizontalTableRow,
  type TableConstructorOptions,
  type VerticalTableRow,
} from "cli-table3";
import { decorators } from "./colors";

type CharsObj = TableConstructorOptions["chars"];

const chars: CharsObj = {
  top: "═",
  "top-mid": "╤",
  "top-left": "╔",
  "top-right": "╗",
  bottom: "═",
  "bottom-mid": "╧",
  "bottom-left": "╚",
  "bottom-right": "╝",
  left: "║",
  "left-mid": "╟",
  mid: "─",
  "mid-mid": "┼",
  right: "║",
  "right-mid": "╢",
  middle: "│",
};

type CreatedTable = GenericTable<
  HorizontalTableRow | VerticalTableRow | CrossTableRow
>;

interface TableCreationProps {
  colWidths: number[];
  head?: Cell[];
  doubleBorder?: boolean;
  wordWrap?: boolean;
}

export type LogType = "text" | "table" | "silent";

// Module level config.
let logType: LogType = "table";
const logTypeValues: LogType[] = ["text", "table", "silent"];

const isLogType = (value: string): value is LogType =>
  logTypeValues.some((t) => t === value);

export const getLogType = (value?: string): LogType => {
  if (value && isLogType(value)) return value;

  if (value)
    console.error(
      decorators.red(
        `Argument 'logType' provided ('${value}') is not one of the accepted params; Falling back to 'table'.\n` +
          `Possible values: ${logTypeValues.join(", ")} - Defaults to 'table'.\n`,
      ),
    );
  return "table";
};

export const setLogType = (value: LogType) => {
  logType = value;
};

const cellText = (cell: Cell): string => {
  if (cell !== null && typeof cell === "object") return String(cell.content);
  return cell === undefined || cell === null ? "" : String(cell);
};

export class CreateLogTable {
  table: CreatedTable;
  colWidths: number[];

  constructor({ head, colWidths, doubleBorder, wordWrap }: TableCreationProps) {
    this.colWidths = colWidths;
    const params: TableConstructorOptions = {
      colWidths,
      wordWrap: wordWrap || false,
    };

    if (head?.length) params.head = head.map(cellText);
    if (doubleBorder) params.chars = chars;

    this.table = new Table(params);
  }

  pushTo = (inputs: Cell[][]) => {
    for (const input of inputs) {
      // long values are split on the column width so the borders stay aligned
      const row = input.map((inp, index) => {
        if (typeof inp !== "string") return inp;
        const split = (this.colWidths[index] || 80) - 10;
        if (inp.length <= split * 2) return inp;
        const parts: string[] = [];
        for (let i = 0; i * split < inp.length; i++)
          parts.push(inp.substring(split * i, split * (i + 1)));
        return parts.join("\n");
      });

      if (logType === "text") {
        console.log(row.map(cellText).join(" : ").replace(/\n/g, ""));
      } else if (logType === "table") {
        this.table.push(row);
      }
    }
  };

  print = () => {
    if (logType === "table") console.log(this.table.toString());
  };

  // create, push and print in one call; keeps the log lines short at the call site
  pushToPrint = (inputs: Cell[][]) => {
    this.pushTo(inputs);
    this.print();
  };
}
