import type { IOperatorNotifier } from "../../core/domain/services/operator.service.js";

export class ConsoleNotifier implements IOperatorNotifier {
  constructor(private write: (text: string) => void = (text) => console.log(text)) {}

  notify(title: string, lines: string[]): void {
    const width = Math.max(title.length, ...lines.map((l) => l.length));
    const rule = "-".repeat(width);
    this.write(["", title, rule, ...lines, ""].join("\n"));
  }
}
