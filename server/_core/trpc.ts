import { initTRPC } from "@trpc/server";
import type { EntryRepository } from "../suggestion/service/EntryRepository";

export type TrpcContext = {
  entryRepository: EntryRepository;
};

const t = initTRPC.context<TrpcContext>().create();

export const router = t.router;
export const publicProcedure = t.procedure;
