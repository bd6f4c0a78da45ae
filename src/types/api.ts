export type TJsonValue =
  | string
  | number
  | boolean
  | null
  | TJsonValue[]
  | { [key: string]: TJsonValue }

/** Parsed body of a successful response, passed through untouched. */
export type TApiResult = TJsonValue

export type TRecipient = {
  name: string
  street: string
  zip: string
  city: string
  country: string
}

/** Body of POST /letters. */
export type TSendLetterPayload = {
  pdf: string
  recipient: TRecipient
  type: string
  label?: string
}
