/**
 * Transport attributes the engine needs from an inbound request.
 */
export interface RequestAttributes {
  address?: string;
  credential?: string;
}
