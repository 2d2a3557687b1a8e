export interface IOperatorNotifier {
  notify(title: string, lines: string[]): void;
}

export interface IPrompter {
  ask(question: string, fallback?: string): Promise<string>;
  askSecret(question: string): Promise<string>;
  close(): void;
}
