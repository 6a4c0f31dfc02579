/**
 * Wire-level key names for the portal's list-calls endpoint. Deployments of
 * the same portal software occasionally disagree on casing or naming, so every
 * key is overridable from a JSON file (see `CAD_FIELD_NAMES_PATH`).
 */
export interface PortalBodyFieldNames {
  includeOpen: string;
  includeClosed: string;
  includeCount: string;
  pagingOptions: string;
  sortOptions: string;
  sortName: string;
  sortDirection: string;
  sortSequence: string;
  take: string;
  skip: string;
  filterOptions: string;
  intersectionSearch: string;
  searchText: string;
  filterParameters: string;
}

export interface PortalQueryFieldNames {
  includeOpen: string;
  includeClosed: string;
  take: string;
  skip: string;
  searchText: string;
}

export interface PortalResponseFieldNames {
  records: string;
  total: string;
  agencyName: string;
}

export interface PortalSortDefaults {
  field: string;
  direction: string;
}

export interface PortalFieldNames {
  body: PortalBodyFieldNames;
  query: PortalQueryFieldNames;
  response: PortalResponseFieldNames;
  sort: PortalSortDefaults;
}

export const DEFAULT_PORTAL_FIELD_NAMES: PortalFieldNames = {
  body: {
    includeOpen: "IncludeOpenCalls",
    includeClosed: "IncludeClosedCalls",
    includeCount: "IncludeCount",
    pagingOptions: "PagingOptions",
    sortOptions: "SortOptions",
    sortName: "Name",
    sortDirection: "SortDirection",
    sortSequence: "Sequence",
    take: "Take",
    skip: "Skip",
    filterOptions: "FilterOptionsParameters",
    intersectionSearch: "IntersectionSearch",
    searchText: "SearchText",
    filterParameters: "Parameters"
  },
  query: {
    includeOpen: "includeOpen",
    includeClosed: "includeClosed",
    take: "take",
    skip: "skip",
    searchText: "searchText"
  },
  response: {
    records: "CADCalls",
    total: "Total",
    agencyName: "Agency"
  },
  sort: {
    field: "StartTime",
    direction: "Descending"
  }
};

export const DEFAULT_ENDPOINT_PATH = "/api/CADCalls/{agencyId}";

export const CAD_CALLS_PAGE_PATH = "/CADCalls";
