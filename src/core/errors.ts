export class FlowCompilerError extends Error {
  readonly code: string;
  readonly nodeId?: string;

  constructor(code: string, message: string, nodeId?: string) {
    super(message);
    this.name = "FlowCompilerError";
    this.code = code;
    this.nodeId = nodeId;
  }
}
