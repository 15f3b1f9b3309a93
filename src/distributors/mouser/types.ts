/**
 * Mouser Search API v2 shapes.
 */

export interface MouserPriceBreak {
  Quantity?: number;
  /** Currency-formatted, e.g. "$0.414" or "0,35 €". */
  Price?: string;
  Currency?: string;
}

export interface MouserAttribute {
  AttributeName?: string;
  AttributeValue?: string;
}

export interface MouserPart {
  MouserPartNumber?: string;
  ManufacturerPartNumber?: string;
  Manufacturer?: string;
  Description?: string;
  Category?: string;
  /** Free text such as "16,563 In Stock". */
  Availability?: string;
  AvailabilityInStock?: string | number | null;
  PriceBreaks?: MouserPriceBreak[];
  ProductAttributes?: MouserAttribute[];
  DataSheetUrl?: string;
  ProductDetailUrl?: string;
  ROHSStatus?: string;
  LifecycleStatus?: string | null;
  IsDiscontinued?: string;
  Min?: string | number;
}

export interface MouserError {
  Code?: string;
  Message?: string;
}

export interface MouserSearchResponse {
  Errors?: MouserError[] | null;
  SearchResults?: {
    NumberOfResult?: number;
    Parts?: MouserPart[] | null;
  } | null;
}

export interface MouserKeywordRequest {
  keyword: string;
  records: number;
  pageNumber: number;
  searchOptions: "None" | "InStock";
  searchWithYourSignUpLanguage: "false";
}

export interface MouserKeywordMfrRequest extends MouserKeywordRequest {
  manufacturerName: string;
}
