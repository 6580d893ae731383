import { Body, Controller, Get, Inject, Param, Patch, Post, Req, UseGuards } from '@nestjs/common';

import { CallerSignatureGuard } from '../iota/caller-signature.guard';
import { requireCaller, type SignedRequest } from '../iota/signed-request';
import { ApprovalsService } from './approvals.service';
import { HashContentDto } from './dto/hash-content.dto';
import { SignFormDto } from './dto/sign-form.dto';
import { UpdateFormDto } from './dto/update-form.dto';
import { VerifyFormDto } from './dto/verify-form.dto';

@Controller()
export class ApprovalsController {
  constructor(@Inject(ApprovalsService) private readonly approvals: ApprovalsService) {}

  @Post('approvals')
  @UseGuards(CallerSignatureGuard)
  signFormSubmission(@Req() req: SignedRequest, @Body() dto: SignFormDto) {
    return this.approvals.signFormSubmission(requireCaller(req), dto);
  }

  @Patch('approvals/:documentId')
  @UseGuards(CallerSignatureGuard)
  updateFormApproval(@Req() req: SignedRequest, @Param('documentId') documentId: string, @Body() dto: UpdateFormDto) {
    return this.approvals.updateFormApproval(requireCaller(req), documentId, dto.metadata);
  }

  @Post('approvals/:documentId/verify')
  verifyFormApproval(@Param('documentId') documentId: string, @Body() dto: VerifyFormDto) {
    return this.approvals.verifyFormApproval(documentId, dto.expectedHash);
  }

  @Get('approvals/:documentId')
  getFormApprovalDetails(@Param('documentId') documentId: string) {
    return this.approvals.getFormApprovalDetails(documentId);
  }

  @Get('approvals/:documentId/address')
  getRecordAddress(@Param('documentId') documentId: string) {
    return { documentId, address: this.approvals.addressOf(documentId) };
  }

  @Post('utils/hash')
  hashContent(@Body() dto: HashContentDto) {
    return this.approvals.hashContent(dto.content);
  }
}
