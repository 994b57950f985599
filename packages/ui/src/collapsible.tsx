import { Disclosure, DisclosureButton, DisclosurePanel } from "@headlessui/react";
import { ChevronDown } from "lucide-react";
import type { ReactNode } from "react";
import { Panel } from "./panel.js";

export interface CollapsibleProps {
  title: ReactNode;
  defaultOpen?: boolean;
  children: ReactNode;
}

export function Collapsible({ title, defaultOpen = false, children }: CollapsibleProps) {
  return (
    <Panel className="p-0">
      <Disclosure defaultOpen={defaultOpen}>
        <DisclosureButton className="group flex w-full items-center justify-between px-5 py-4 text-left text-sm font-semibold text-slate-100">
          {title}
          <ChevronDown className="h-4 w-4 text-slate-400 transition group-data-[open]:rotate-180" />
        </DisclosureButton>
        <DisclosurePanel className="border-t border-white/5 px-5 py-4">{children}</DisclosurePanel>
      </Disclosure>
    </Panel>
  );
}
