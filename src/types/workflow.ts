export interface StartWorkflowResponseV1 {
  run_id: string;
  message: string;
}

export interface WorkflowStatusV1 {
  running: boolean;
  progress: string;
  output: string;
  error: string | null;
}

export interface UploadResponseV1 {
  text: string;
  filename: string;
}
