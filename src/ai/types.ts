export interface Classification {
  responseType: string;
  extractedValue?: string;
  needsFollowup: boolean;
}

export type ClassificationSource = 'classifier_http' | 'classifier_local_default';

export interface ClassifierRequest {
  callSid: string;
  prompt: string;
}

/** Narrow contract the conversation flow talks to. */
export interface ResponseClassifier {
  /** Raw classifier text; decoding is the caller's job. */
  classify(request: ClassifierRequest): Promise<string>;
  /** Natural-language follow-up question, or null when none could be produced. */
  generateFollowup(request: ClassifierRequest): Promise<string | null>;
}
