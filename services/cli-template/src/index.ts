#!/usr/bin/env node
import { printGreeting } from "./greeting.js";

printGreeting();
