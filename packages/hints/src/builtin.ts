/** Instructions appended to a prompt to request structured output. */
export const defaultFormatHints = {
  json: "Please structure your entire response as a JSON object. If the user query doesn't specify a particular structure, create an appropriate JSON structure for the response content.",
  yaml: "Please structure your entire response as a YAML manifest. If the user query doesn't specify a particular structure, create an appropriate YAML structure for the response content.",
};

/** Union of supported structured output formats. */
export type OutputFormat = keyof typeof defaultFormatHints;

export function isOutputFormat(value: string): value is OutputFormat {
  return Object.hasOwn(defaultFormatHints, value);
}
