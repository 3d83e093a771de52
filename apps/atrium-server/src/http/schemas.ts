import { z } from "zod";
import { isId } from "../lib/ids.js";

export const idSchema = z.string().refine(isId, "Invalid id");

export const idParamsSchema = z.object({ id: idSchema });

export const businessParamsSchema = z.object({ businessId: idSchema });
