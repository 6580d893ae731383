import { Body, Controller, Delete, Get, Inject, Param, Post, Req, UseGuards } from '@nestjs/common';

import { CallerSignatureGuard } from '../iota/caller-signature.guard';
import { requireCaller, type SignedRequest } from '../iota/signed-request';
import { AdminsService } from './admins.service';
import { AddAdminDto } from './dto/add-admin.dto';

@Controller('admin')
export class AdminsController {
  constructor(@Inject(AdminsService) private readonly admins: AdminsService) {}

  @Get()
  getRegistry() {
    return this.admins.getRegistryDetails();
  }

  @Get('admins/:address')
  isAdmin(@Param('address') address: string) {
    return this.admins.isAdmin(address);
  }

  @Post('initialize')
  @UseGuards(CallerSignatureGuard)
  initialize(@Req() req: SignedRequest) {
    return this.admins.initialize(requireCaller(req));
  }

  @Post('admins')
  @UseGuards(CallerSignatureGuard)
  addAdmin(@Req() req: SignedRequest, @Body() dto: AddAdminDto) {
    return this.admins.addAdmin(requireCaller(req), dto.newAdmin);
  }

  @Delete('admins/:address')
  @UseGuards(CallerSignatureGuard)
  removeAdmin(@Req() req: SignedRequest, @Param('address') address: string) {
    return this.admins.removeAdmin(requireCaller(req), address);
  }
}
