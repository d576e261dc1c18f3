/**
 * Parser constants.
 *
 * This module provides centralized constants used throughout the parser,
 * including character constants for syntax tokens and regex patterns.
 *
 * @module
 */

// Character constants
export const LEFT_PAREN = "(";
export const RIGHT_PAREN = ")";
export const LAMBDA = "λ";
export const BACKSLASH = "\\";
export const DOT = ".";
export const COLON = ":";
export const ARROW = "→";
export const ASCII_ARROW = "->";

// Regex patterns
export const WHITESPACE_REGEX = /\s/;
export const IDENTIFIER_CHAR_REGEX = /[a-zA-Z]/;
