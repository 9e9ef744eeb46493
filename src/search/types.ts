export type MaybeText = string | null | undefined;

export type CatalogSubRecord = {
  question?: MaybeText;
  groupItemTitle?: MaybeText;
};

/** The fields of an event the matcher reads; everything else is carried through untouched. */
export type CatalogRecord = {
  slug?: MaybeText;
  title?: MaybeText;
  description?: MaybeText;
  markets?: readonly CatalogSubRecord[] | null;
};
