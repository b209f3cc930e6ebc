/**
 * Splits a nutrition-dataset label into its size expression and descriptive name.
 *
 * Labels are expected to start with a two-token size ("16 oz Jasmine Green Tea Hot").
 * Labels that do not have at least three tokens carry no size and are matched
 * against every size.
 */

export interface DecomposedLabel {
  sizeToken?: string
  nameRemainder: string
}

export function decomposeLabel(label: string): DecomposedLabel {
  const first = label.indexOf(' ')
  const second = first === -1 ? -1 : label.indexOf(' ', first + 1)

  if (second === -1) {
    return { nameRemainder: label }
  }

  return {
    sizeToken: `${label.slice(0, first)} ${label.slice(first + 1, second)}`,
    nameRemainder: label.slice(second + 1),
  }
}
