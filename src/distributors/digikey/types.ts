/**
 * DigiKey Product Information API v4 shapes.
 */

export interface DigiKeyPriceBreak {
  BreakQuantity?: number;
  UnitPrice?: number;
  TotalPrice?: number;
}

export interface DigiKeyVariation {
  DigiKeyProductNumber?: string;
  MinimumOrderQuantity?: number;
  StandardPricing?: DigiKeyPriceBreak[];
  PackageType?: { Name?: string };
}

export interface DigiKeyParameter {
  ParameterText?: string;
  ValueText?: string;
}

export interface DigiKeyProduct {
  ManufacturerProductNumber?: string;
  Description?: { ProductDescription?: string; DetailedDescription?: string };
  Manufacturer?: { Id?: number; Name?: string };
  Category?: { CategoryId?: number; Name?: string };
  ProductStatus?: { Id?: number; Status?: string };
  Classifications?: { RohsStatus?: string; MoistureSensitivityLevel?: string };
  ProductVariations?: DigiKeyVariation[];
  Parameters?: DigiKeyParameter[];
  QuantityAvailable?: number;
  UnitPrice?: number;
  DatasheetUrl?: string | null;
  ProductUrl?: string | null;
  Discontinued?: boolean;
}

export interface DigiKeySearchRequest {
  Keywords: string;
  Limit: number;
  Offset: number;
  FilterOptionsRequest?: { SearchOptions: string[] };
}

export interface DigiKeySearchResponse {
  Products?: DigiKeyProduct[] | null;
  ExactMatches?: DigiKeyProduct[] | null;
  ProductsCount?: number;
}

export interface DigiKeyDetailsResponse {
  Product?: DigiKeyProduct | null;
}

export interface DigiKeyTokenResponse {
  access_token?: string;
  expires_in?: number;
  token_type?: string;
  error?: string;
  error_description?: string;
}
