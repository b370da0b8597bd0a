#!/usr/bin/env node
import { Command } from "commander";
import { installCommand } from "./commands/install.js";
import { planCommand } from "./commands/plan.js";
import { doctorCommand } from "./commands/doctor.js";

const program = new Command();

program
  .name("hyprdeck")
  .description("Provision a Hyprland and Quickshell desktop on Arch- or Fedora-based systems.")
  .version("0.1.0");

program.addCommand(installCommand, { isDefault: true });
program.addCommand(planCommand);
program.addCommand(doctorCommand);

await program.parseAsync();
