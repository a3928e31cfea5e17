import { describe, expect, it, vi } from "vitest";
import type { SendTicket } from "@/modules/registry/registry.types";
import { processTicketJob } from "./jobs";

const job = {
  id: "job-1",
  data: { contactAddress: "nimal@example.com", displayName: "Nimal Perera", indexKey: "IT21000001" },
};

describe("processTicketJob", () => {
  it("should send the ticket described by the job", async () => {
    const sendTicket = vi.fn<SendTicket>().mockResolvedValue(true);

    const sent = await processTicketJob(job, sendTicket);

    expect(sent).toBe(true);
    expect(sendTicket).toHaveBeenCalledWith("nimal@example.com", "Nimal Perera", "IT21000001");
  });

  it("should complete without throwing when the ticket cannot be sent", async () => {
    const sendTicket = vi.fn<SendTicket>().mockResolvedValue(false);

    await expect(processTicketJob(job, sendTicket)).resolves.toBe(false);
    expect(sendTicket).toHaveBeenCalledTimes(1);
  });
});
