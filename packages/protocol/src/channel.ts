export type ChannelType =
  | "messages"
  | "voices"
  | "drawings"
  | "documents"
  | "databases"
  | "reports";

export interface Channel {
  id: string;
  businessId: string;
  name: string;
  type: ChannelType;
  categoryId?: string;
  order: number;
  createdAt: string;
  updatedAt: string;
}

export interface ChannelCategory {
  id: string;
  businessId: string;
  name: string;
  createdAt: string;
  updatedAt: string;
}
