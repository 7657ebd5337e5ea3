import { FileSystemEdit } from "./filesystem";

/**
 * Results produced by executing a step.
 *
 * Each HistoryNode stores exactly one of these once its step finishes.
 * A step that throws is recorded with an ErrorObservation instead.
 */
export type Observation =
  | TextObservation
  | UserInputObservation
  | FileSystemEditObservation
  | ErrorObservation;

export interface TextObservation {
  kind: "text";
  text: string;
}

export interface UserInputObservation {
  kind: "user_input";
  userInput: string;
}

export interface FileSystemEditObservation {
  kind: "file_system_edit";
  edit: FileSystemEdit;
  /**
   * Content of the affected file after the edit, when the host reports it.
   */
  content?: string;
}

export interface ErrorObservation {
  kind: "error";
  title: string;
  message: string;
  stepName?: string;
}

export function observationText(observation: Observation): string {
  switch (observation.kind) {
    case "text":
      return observation.text;
    case "user_input":
      return observation.userInput;
    case "file_system_edit":
      return observation.content ?? "";
    case "error":
      return observation.message;
  }
}
